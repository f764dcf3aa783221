/**
 * Runs inside the page. Must stay self-contained: Playwright serialises the
 * function source, so it cannot reach module scope.
 */
export function dispatchPointerPair(selector: string): boolean {
  const xpathPrefix = "xpath=";
  let element: Element | null = null;
  if (selector.startsWith(xpathPrefix)) {
    const result = document.evaluate(
      selector.slice(xpathPrefix.length),
      document,
      null,
      XPathResult.FIRST_ORDERED_NODE_TYPE,
      null
    );
    const node = result.singleNodeValue;
    element = node instanceof Element ? node : null;
  } else {
    element = document.querySelector(selector);
  }
  if (!element) return false;

  const rect = element.getBoundingClientRect();
  const init: PointerEventInit = {
    bubbles: true,
    cancelable: true,
    view: window,
    pointerId: 1,
    button: 0,
    isPrimary: true,
    clientX: rect.left + rect.width / 2,
    clientY: rect.top + rect.height / 2
  };
  element.dispatchEvent(new PointerEvent("pointerdown", init));
  element.dispatchEvent(new PointerEvent("pointerup", init));
  return true;
}

/** Runs inside a frame document. */
export function documentContentHeight(): number {
  const body = document.body;
  const root = document.documentElement;
  return Math.max(
    body ? body.scrollHeight : 0,
    body ? body.offsetHeight : 0,
    root.clientHeight,
    root.scrollHeight,
    root.offsetHeight
  );
}

/** Runs inside the host page. */
export function expandFrame(args: { xpath: string; height: number }): boolean {
  const node = document.evaluate(args.xpath, document, null, XPathResult.FIRST_ORDERED_NODE_TYPE, null)
    .singleNodeValue;
  if (!(node instanceof HTMLIFrameElement)) return false;
  node.style.height = `${args.height}px`;
  node.style.width = "100%";
  node.style.border = "none";
  node.style.overflow = "visible";
  return true;
}
