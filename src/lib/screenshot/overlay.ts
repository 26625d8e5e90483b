/**
 * URL Overlay
 *
 * Pins a semi-transparent label with the visited URL to the bottom-right
 * corner of the page so it shows up in the capture.
 */

export const OVERLAY_STYLE: Record<string, string> = {
  position: 'fixed',
  bottom: '0',
  right: '0',
  width: '250px',
  height: 'auto',
  backgroundColor: 'rgba(0, 0, 0, 0.2)',
  color: 'black',
  fontSize: '20px',
  padding: '10px',
  zIndex: '9999',
  fontFamily: 'Arial, sans-serif',
  overflowY: 'auto',
  textAlign: 'center',
};

export interface ScriptEvaluator {
  evaluate(script: string): Promise<unknown>;
}

/**
 * Build the page script. The URL goes in as a JSON literal, never as raw text.
 */
export function buildOverlayScript(url: string): string {
  return `(() => {
  const bar = document.createElement('div');
  Object.assign(bar.style, ${JSON.stringify(OVERLAY_STYLE)});
  bar.innerText = ${JSON.stringify(url)};
  document.body.appendChild(bar);
})()`;
}

export async function addUrlOverlay(page: ScriptEvaluator, url: string): Promise<void> {
  await page.evaluate(buildOverlayScript(url));
}
