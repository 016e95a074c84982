import { decodeContent } from "./decoder.js";
import { extractNodes } from "./extractor.js";
import { logger } from "./logger.js";
import type { FetchOutcome, NodeLink, Source } from "./types.js";
import { sleep } from "./utils.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchOptions {
  userAgent?: string;
  retryDelayMs?: number;
  fetchImpl?: FetchFn;
}

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";
export const DEFAULT_RETRY_DELAY_MS = 1000;
export const HTTP_URL_PATTERN = /^https?:\/\/\S+$/i;

type Attempt = { ok: true; nodes: NodeLink[] } | { ok: false; reason: string };

async function attemptFetch(source: Source, options: FetchOptions): Promise<Attempt> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), source.timeoutSeconds * 1000);
  try {
    const response = await fetchImpl(source.url, {
      headers: {
        "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: "text/plain,*/*",
      },
      signal: controller.signal,
    });
    if (!response.ok) {
      return { ok: false, reason: `HTTP ${response.status}` };
    }
    const body = (await response.text()).trim();
    if (!body) {
      return { ok: false, reason: "empty body" };
    }
    const nodes = extractNodes(decodeContent(body));
    if (!nodes.length) {
      return { ok: false, reason: "no nodes extracted" };
    }
    return { ok: true, nodes };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Fetches one source with up to `maxRetries` extra attempts.
 * Never rejects: exhausted retries yield an empty node list and the last failure reason.
 */
export async function fetchSource(source: Source, options: FetchOptions = {}): Promise<FetchOutcome> {
  const totalAttempts = source.maxRetries + 1;
  const delay = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  let lastReason = "not attempted";

  if (!HTTP_URL_PATTERN.test(source.url)) {
    logger.warn("Skipping source with invalid URL", { url: source.url });
    return { url: source.url, nodes: [], attempts: 0, error: "invalid URL" };
  }

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    logger.debug("Fetching source", { url: source.url, attempt, of: totalAttempts });
    const result = await attemptFetch(source, options);
    if (result.ok) {
      logger.info("Source fetched", { url: source.url, nodes: result.nodes.length, attempt });
      return { url: source.url, nodes: result.nodes, attempts: attempt };
    }
    lastReason = result.reason;
    logger.warn("Source attempt failed", { url: source.url, attempt, of: totalAttempts, reason: result.reason });
    if (attempt < totalAttempts) {
      await sleep(delay);
    }
  }

  logger.error("Source exhausted retries", { url: source.url, attempts: totalAttempts, reason: lastReason });
  return { url: source.url, nodes: [], attempts: totalAttempts, error: lastReason };
}
