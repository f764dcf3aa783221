export type ImageFormat = "png" | "jpeg";

export interface ImageOptions {
  format: ImageFormat;
  /** Only applied to jpeg. */
  quality: number;
}

/**
 * One automated browser page, owned by a single collection run. Navigation
 * reports failure as `false`; the capture primitives may throw and are wrapped
 * by the screenshot capturer.
 */
export interface BrowserSession {
  open(): Promise<void>;
  /**
   * Load `url`, then wait for the first of `readySelectors` (tried in order) to
   * be attached. Resolves `false` when the load fails or nothing appears.
   */
  navigate(url: string, readySelectors?: readonly string[]): Promise<boolean>;
  content(): Promise<string>;
  scrollToTop(): Promise<void>;
  wait(ms: number): Promise<void>;
  /** Full document, beyond the viewport, through the DevTools protocol. */
  captureDocument(image: ImageOptions): Promise<Buffer>;
  captureViewport(image: ImageOptions): Promise<Buffer>;
  /** Null when no element matches `selector`. */
  captureElement(selector: string, image: ImageOptions): Promise<Buffer | null>;
  /** Content height of the iframe at `frameXPath`, or null when it is absent. */
  measureFrameHeight(frameXPath: string): Promise<number | null>;
  resizeFrame(frameXPath: string, height: number): Promise<boolean>;
  /**
   * Dispatch `pointerdown` and `pointerup` at the centre of the element matched
   * by a CSS or `xpath=` selector. Some widgets ignore synthetic `click`.
   */
  dispatchPointerClick(selector: string): Promise<boolean>;
  /** Safe to call more than once. */
  close(): Promise<void>;
}
