import { NoSourcesError } from "./errors.js";
import { fetchSource, HTTP_URL_PATTERN, type FetchOptions } from "./fetcher.js";
import { DEFAULT_IDENTITY_OPTIONS, identify } from "./identity.js";
import { matchScheme } from "./extractor.js";
import { logger } from "./logger.js";
import type {
  AggregateResult,
  FetchOutcome,
  IdentityOptions,
  NodeIdentity,
  NodeLink,
  RunParameters,
  Source,
  SourceOutcome,
} from "./types.js";
import { sleep } from "./utils.js";

export const MAX_WORKERS = 20;
export const DEFAULT_SERIAL_DELAY_MS = 500;

/**
 * Runs `worker` over `items` with at most `limit` in flight and reports each
 * result to `onResult` as it settles. Resolves once every item has been handled.
 */
export type Dispatcher = <T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>,
  onResult: (result: R, item: T) => void
) => Promise<void>;

export const runPool: Dispatcher = async (items, limit, worker, onResult) => {
  let next = 0;
  // Once a lane fails the pool is abandoned: the other lanes stop taking items and drop late results.
  let failed = false;
  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (!failed && next < items.length) {
      const item = items[next++];
      try {
        const result = await worker(item);
        if (failed) {
          return;
        }
        onResult(result, item);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  });
  await Promise.all(lanes);
};

/**
 * Per-run dedup state. Only mutated through `fold`, which runs synchronously,
 * so concurrent fetches cannot interleave inside a merge.
 */
export class NodeAccumulator {
  private readonly seen = new Set<NodeIdentity>();
  private readonly nodes: NodeLink[] = [];
  private readonly outcomes: SourceOutcome[] = [];
  private readonly protocolCounts: Record<string, number> = {};
  private duplicates = 0;

  constructor(private readonly identityOptions: IdentityOptions = DEFAULT_IDENTITY_OPTIONS) {}

  fold(outcome: FetchOutcome): SourceOutcome {
    let accepted = 0;
    let duplicates = 0;
    for (const node of outcome.nodes) {
      const id = identify(node, this.identityOptions);
      if (this.seen.has(id)) {
        duplicates++;
        continue;
      }
      this.seen.add(id);
      this.nodes.push(node);
      const scheme = matchScheme(node) ?? "unknown";
      this.protocolCounts[scheme] = (this.protocolCounts[scheme] ?? 0) + 1;
      accepted++;
    }
    this.duplicates += duplicates;
    const summary: SourceOutcome = { ...outcome, accepted, duplicates };
    this.outcomes.push(summary);
    return summary;
  }

  result(mode: AggregateResult["mode"]): AggregateResult {
    return {
      nodes: [...this.nodes],
      sources: [...this.outcomes],
      protocolCounts: { ...this.protocolCounts },
      duplicates: this.duplicates,
      mode,
    };
  }
}

export interface MergeOptions extends FetchOptions {
  identity?: IdentityOptions;
  serialDelayMs?: number;
  dispatcher?: Dispatcher;
}

/** Keeps http(s) URLs, first occurrence wins. */
export function normalizeSourceList(urls: readonly string[]): { accepted: string[]; rejected: string[] } {
  const accepted: string[] = [];
  const rejected: string[] = [];
  const seen = new Set<string>();
  for (const raw of urls) {
    const url = raw.trim();
    if (!HTTP_URL_PATTERN.test(url)) {
      rejected.push(raw);
      continue;
    }
    if (!seen.has(url)) {
      seen.add(url);
      accepted.push(url);
    }
  }
  return { accepted, rejected };
}

export function poolSize(sourceCount: number, workerLimit: number): number {
  return Math.max(1, Math.min(sourceCount, workerLimit, MAX_WORKERS));
}

function logFold(outcome: SourceOutcome) {
  logger.debug("Source merged", {
    url: outcome.url,
    nodes: outcome.nodes.length,
    accepted: outcome.accepted,
    duplicates: outcome.duplicates,
  });
}

async function mergeSerially(sources: Source[], options: MergeOptions): Promise<AggregateResult> {
  const accumulator = new NodeAccumulator(options.identity);
  const delay = options.serialDelayMs ?? DEFAULT_SERIAL_DELAY_MS;
  logger.info("Fetching sources serially", { sources: sources.length });
  for (const [index, source] of sources.entries()) {
    if (index > 0) {
      await sleep(delay);
    }
    logFold(accumulator.fold(await fetchSource(source, options)));
  }
  return accumulator.result("serial");
}

/**
 * Fetches every source through a bounded pool and merges the results into one
 * deduplicated node list. Falls back to a serial pass if the pool itself fails.
 */
export async function mergeAll(
  urls: readonly string[],
  params: RunParameters,
  options: MergeOptions = {}
): Promise<AggregateResult> {
  const { accepted, rejected } = normalizeSourceList(urls);
  for (const url of rejected) {
    logger.warn("Ignoring source that is not an http(s) URL", { url });
  }
  if (!accepted.length) {
    throw new NoSourcesError(rejected);
  }

  const sources: Source[] = accepted.map((url) => ({
    url,
    timeoutSeconds: params.timeoutSeconds,
    maxRetries: params.maxRetries,
  }));
  const workers = poolSize(sources.length, params.workerLimit);
  logger.info("Merging sources", { sources: sources.length, workers });

  const dispatch = options.dispatcher ?? runPool;
  const accumulator = new NodeAccumulator(options.identity);
  try {
    await dispatch(
      sources,
      workers,
      (source) => fetchSource(source, options),
      (outcome) => logFold(accumulator.fold(outcome))
    );
  } catch (error) {
    logger.error("Concurrent fetch failed; retrying serially", {
      error: error instanceof Error ? error.message : String(error),
    });
    return mergeSerially(sources, options);
  }

  const result = accumulator.result("concurrent");
  logger.info("Merge complete", { nodes: result.nodes.length, duplicates: result.duplicates });
  return result;
}
