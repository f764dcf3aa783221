import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { ScreenshotCapturer } from "../src/capture/screenshot";
import { silentLogger } from "../src/utils/logger";
import { FakeSession } from "./fakeSession";

const image = { format: "png" as const, quality: 95 };

describe("screenshot capturer", () => {
  let dir: string;
  let session: FakeSession;
  let capturer: ScreenshotCapturer;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "capture-"));
    session = new FakeSession();
    capturer = new ScreenshotCapturer(session, image, silentLogger());
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the full document capture", async () => {
    const filePath = path.join(dir, "page.png");
    const outcome = await capturer.captureFullPage(filePath);

    expect(outcome).toEqual({ status: "success", strategy: "cdp_full_page", path: filePath, issues: [] });
    expect((await readFile(filePath)).toString()).toBe("document");
  });

  it("falls back to the viewport when the protocol capture fails", async () => {
    session.documentImage = new Error("cdp down");
    const filePath = path.join(dir, "page.png");
    const outcome = await capturer.captureFullPage(filePath);

    expect(outcome).toEqual({
      status: "degraded",
      strategy: "viewport",
      path: filePath,
      issues: ["cdp_full_page: cdp down"]
    });
    expect((await readFile(filePath)).toString()).toBe("viewport");
  });

  it("fails when no strategy yields an image", async () => {
    session.documentImage = Buffer.alloc(0);
    session.viewportImage = new Error("page closed");
    const outcome = await capturer.captureFullPage(path.join(dir, "page.png"));

    expect(outcome).toEqual({
      status: "failed",
      issues: ["cdp_full_page: no image data", "viewport: page closed"]
    });
  });

  it("overwrites an existing file", async () => {
    const filePath = path.join(dir, "page.png");
    await writeFile(filePath, "old contents that are longer");
    await capturer.captureFullPage(filePath);

    expect((await readFile(filePath)).toString()).toBe("document");
  });

  it("uses the first selector that matches an element", async () => {
    session.elements[".chart_area"] = Buffer.from("chart");
    const filePath = path.join(dir, "chart.png");
    const outcome = await capturer.captureElement(["cq-context", ".chart_area", "#chart"], filePath);

    expect(outcome).toEqual({
      status: "success",
      strategy: "element",
      path: filePath,
      issues: ["element cq-context: not found"]
    });
    expect((await readFile(filePath)).toString()).toBe("chart");
  });

  it("captures the full page when no element matches", async () => {
    const filePath = path.join(dir, "chart.png");
    const outcome = await capturer.captureElement(["cq-context", "#chart"], filePath);

    expect(outcome).toEqual({
      status: "degraded",
      strategy: "cdp_full_page",
      path: filePath,
      issues: ["element cq-context: not found", "element #chart: not found"]
    });
  });

  it("fails with every issue when the fallback fails too", async () => {
    session.documentImage = new Error("cdp down");
    session.viewportImage = new Error("page closed");
    const outcome = await capturer.captureElement(["#chart"], path.join(dir, "chart.png"));

    expect(outcome).toEqual({
      status: "failed",
      issues: ["element #chart: not found", "cdp_full_page: cdp down", "viewport: page closed"]
    });
  });
});
