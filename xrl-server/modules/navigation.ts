/**
 * URL handling for the XRL and render endpoints: normalizing user-supplied
 * URLs, reading the `url` query parameter and fetching pages with redirects
 * resolved.
 */

import fetch from "node-fetch";
import { z } from "zod";
import { BadRequestError, UpstreamError, errorMessage } from "./errors.js";
import { logDebug } from "./logger.js";

export interface FetchedPage {
  /** URL after following redirects */
  finalUrl: string;
  html: string;
}

export type PageFetcher = (url: string) => Promise<FetchedPage>;

const FETCH_HEADERS = {
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  "User-Agent": "xrl-demo-server/1.0 (+XRL reading layout)",
};

/**
 * Prefix `http://` when the value has no http(s) scheme and require an
 * absolute http(s) URL afterwards.
 */
export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new BadRequestError("URL parameter is missing.");
  }

  const candidate = trimmed.startsWith("http") ? trimmed : `http://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    throw new BadRequestError(`Malformed URL: ${trimmed}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new BadRequestError(`Unsupported URL scheme: ${parsed.protocol}`);
  }
  if (!parsed.hostname) {
    throw new BadRequestError(`Malformed URL: ${trimmed}`);
  }

  return parsed.toString();
}

const urlQuerySchema = z.object({
  url: z.string().trim().min(1),
});

/**
 * Read the `url` query parameter. Repeated parameters and empty values
 * count as missing.
 */
export function readUrlParam(query: unknown): string {
  const parsed = urlQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw new BadRequestError("URL parameter is missing.");
  }
  return normalizeUrl(parsed.data.url);
}

/**
 * Build a fetcher that GETs a page, following redirects, within a timeout.
 */
export function createPageFetcher(timeoutMs: number): PageFetcher {
  return async (url: string): Promise<FetchedPage> => {
    logDebug(`[xrl] Fetching ${url}`);

    let response: Awaited<ReturnType<typeof fetch>>;
    try {
      response = await fetch(url, {
        redirect: "follow",
        timeout: timeoutMs,
        headers: FETCH_HEADERS,
      });
    } catch (error) {
      throw new UpstreamError(
        `Failed to fetch ${url}: ${errorMessage(error)}`,
        error
      );
    }

    if (!response.ok) {
      throw new UpstreamError(
        `Failed to fetch ${url}: upstream responded ${response.status}`
      );
    }

    const html = await response.text();
    return { finalUrl: response.url || url, html };
  };
}

/**
 * Location for re-issuing the current endpoint against the redirected URL.
 */
export function buildSelfRedirect(pathname: string, finalUrl: string): string {
  return `${pathname}?url=${encodeURIComponent(finalUrl)}`;
}
