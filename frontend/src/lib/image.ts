/**
 * image.ts: Pick the image URL a document card should display.
 *
 * The document's own image is probed first; if it is missing, slow or
 * broken, the configured default image is probed once. Each probe gets
 * IMAGE_TIMEOUT_MS. When neither loads the card renders a text placeholder.
 */

import { ApiError } from "../api/errors";
import { config } from "../config";
import { createLogger } from "./logger";

const log = createLogger("image");

export const IMAGE_TIMEOUT_MS = 5000;

interface ResolveOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * true iff `url` loads as an image within the timeout. Loaded through an
 * Image element, which is not subject to CORS.
 */
function probe(url: string, timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
  if (!url) return Promise.resolve(false);
  if (signal?.aborted) return Promise.reject(new ApiError("cancelled", "Image load cancelled."));

  return new Promise<boolean>((resolve, reject) => {
    const img = new Image();

    const settle = () => {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
      img.onload = null;
      img.onerror = null;
    };
    const onAbort = () => {
      settle();
      img.src = "";
      reject(new ApiError("cancelled", "Image load cancelled."));
    };
    const timeoutId = setTimeout(() => {
      settle();
      img.src = "";
      log.warn(`Image at ${url} did not load within ${timeoutMs} ms`);
      resolve(false);
    }, timeoutMs);

    img.onload = () => {
      settle();
      resolve(true);
    };
    img.onerror = () => {
      settle();
      log.warn(`Error loading image from ${url}`);
      resolve(false);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
    img.src = url;
  });
}

/**
 * Resolve to `url` if it loads, else `fallbackUrl` if that loads, else null.
 */
export async function resolveImage(
  url: string,
  fallbackUrl: string = config.defaultImageUrl,
  options: ResolveOptions = {}
): Promise<string | null> {
  const timeoutMs = options.timeoutMs ?? IMAGE_TIMEOUT_MS;

  if (await probe(url, timeoutMs, options.signal)) return url;

  log.info(`Falling back to default image for ${url || "(no image link)"}`);
  if (await probe(fallbackUrl, timeoutMs, options.signal)) return fallbackUrl;

  log.error(`Default image not available at ${fallbackUrl || "(not configured)"}`);
  return null;
}
