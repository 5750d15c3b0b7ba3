/**
 * Opens the preview in the default browser.
 * Wraps the `open` library; failures are reported, never thrown.
 *
 * @module cli/utils/open-browser
 */

import open from "open";

export type OpenResult = { success: true } | { success: false; error: string };

/**
 * Check if a string is a valid http/https URL
 */
export function isValidUrl(target: string): boolean {
  try {
    const url = new URL(target);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Open a URL in the default browser.
 *
 * @example
 * ```typescript
 * const result = await openUrl('http://127.0.0.1:8000');
 * if (!result.success) {
 *   logger.warn(result.error);
 * }
 * ```
 */
export async function openUrl(url: string): Promise<OpenResult> {
  if (!isValidUrl(url)) {
    return { success: false, error: `Invalid URL: ${url}. Must be http:// or https://` };
  }

  try {
    await open(url);
    return { success: true };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: `Failed to open URL "${url}": ${message}` };
  }
}
