import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { normalizeWhitespace } from "../utils/text";

export interface TextMatch {
  text: string;
  selector: string;
}

export function textFromElement(element: cheerio.Cheerio<AnyNode>): string {
  return normalizeWhitespace(element.text());
}

/**
 * Text of the first candidate selector that matches an element with non-empty
 * text, or null when none does.
 */
export function firstText($: cheerio.CheerioAPI, candidates: readonly string[]): TextMatch | null {
  for (const selector of candidates) {
    const element = $(selector).first();
    if (!element.length) continue;
    const text = textFromElement(element);
    if (text) return { text, selector };
  }
  return null;
}

/** Prefer the screen-reader `.blind` copy, which holds the plain number. */
export function blindOrText(element: cheerio.Cheerio<AnyNode>): string {
  const blind = element.find(".blind").first();
  if (blind.length) {
    const text = textFromElement(blind);
    if (text) return text;
  }
  return textFromElement(element);
}

export function missing(field: string, candidates: readonly string[]): string {
  return `${field}: no match for ${candidates.join(" | ")}`;
}
