import type { BrowserSession, ImageOptions } from "../src/browser/session";

export interface FakePage {
  html: string;
  loads?: boolean;
}

type ImageSource = Buffer | Error;

function produce(source: ImageSource): Buffer {
  if (source instanceof Error) throw source;
  return source;
}

/** In-memory stand-in for a browser page, keyed by URL. */
export class FakeSession implements BrowserSession {
  pages: Record<string, FakePage> = {};
  documentImage: ImageSource = Buffer.from("document");
  viewportImage: ImageSource = Buffer.from("viewport");
  elements: Record<string, ImageSource> = {};
  frameHeight: number | null | Error = null;
  clickable = new Set<string>();
  openError: Error | null = null;
  resizeError: Error | null = null;

  readonly navigations: string[] = [];
  readonly clicks: string[] = [];
  readonly waits: number[] = [];
  opened = false;
  closeCount = 0;
  private currentUrl: string | null = null;

  async open(): Promise<void> {
    if (this.openError) throw this.openError;
    this.opened = true;
  }

  async navigate(url: string): Promise<boolean> {
    this.navigations.push(url);
    const page = this.pages[url];
    if (!page || page.loads === false) return false;
    this.currentUrl = url;
    return true;
  }

  async content(): Promise<string> {
    return this.currentUrl ? this.pages[this.currentUrl].html : "";
  }

  async scrollToTop(): Promise<void> {}

  async wait(ms: number): Promise<void> {
    this.waits.push(ms);
  }

  async captureDocument(_image: ImageOptions): Promise<Buffer> {
    return produce(this.documentImage);
  }

  async captureViewport(_image: ImageOptions): Promise<Buffer> {
    return produce(this.viewportImage);
  }

  async captureElement(selector: string, _image: ImageOptions): Promise<Buffer | null> {
    const source = this.elements[selector];
    return source === undefined ? null : produce(source);
  }

  async measureFrameHeight(_frameXPath: string): Promise<number | null> {
    if (this.frameHeight instanceof Error) throw this.frameHeight;
    return this.frameHeight;
  }

  async resizeFrame(_frameXPath: string, _height: number): Promise<boolean> {
    if (this.resizeError) throw this.resizeError;
    return this.frameHeight !== null;
  }

  async dispatchPointerClick(selector: string): Promise<boolean> {
    this.clicks.push(selector);
    return this.clickable.has(selector);
  }

  async close(): Promise<void> {
    this.closeCount += 1;
  }
}
