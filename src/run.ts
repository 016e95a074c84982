import { join } from "node:path";
import { mergeAll, type MergeOptions } from "./aggregator.js";
import { NoNodesError } from "./errors.js";
import { logger } from "./logger.js";
import { publishSubscription } from "./subscription.js";
import type { AppConfig, RunSummary } from "./types.js";

export const DEFAULT_OUTPUT_DIR = "subscriptions_output";

export interface RunOptions extends MergeOptions {
  outputDir?: string;
}

/**
 * One full aggregation run: merge every configured source, publish the
 * artifact and log a summary. Throws an AggregationError when the run
 * produced nothing to publish.
 */
export async function runAggregation(config: AppConfig, options: RunOptions = {}): Promise<RunSummary> {
  const started = Date.now();
  const outputPath = join(options.outputDir ?? DEFAULT_OUTPUT_DIR, config.outputFile);

  const result = await mergeAll(
    config.sources,
    {
      timeoutSeconds: config.timeoutSeconds,
      maxRetries: config.maxRetries,
      workerLimit: config.workerLimit,
    },
    { ...options, identity: options.identity ?? config.identity }
  );

  for (const source of result.sources) {
    logger.info("Source result", {
      url: source.url,
      attempts: source.attempts,
      nodes: source.nodes.length,
      accepted: source.accepted,
      duplicates: source.duplicates,
      error: source.error,
    });
  }

  if (!result.nodes.length) {
    logger.warn("No nodes aggregated; subscription not written", { sources: result.sources.length });
    throw new NoNodesError(result.sources.length);
  }

  const output = await publishSubscription(result.nodes, outputPath);
  const succeeded = result.sources.filter((source) => source.nodes.length > 0).length;
  const summary: RunSummary = {
    sourcesTotal: result.sources.length,
    sourcesSucceeded: succeeded,
    sourcesFailed: result.sources.length - succeeded,
    nodes: result.nodes.length,
    duplicates: result.duplicates,
    protocolCounts: result.protocolCounts,
    elapsedMs: Date.now() - started,
    output,
  };
  logger.info("Run complete", {
    ...summary,
    elapsedSeconds: Number((summary.elapsedMs / 1000).toFixed(2)),
    mode: result.mode,
  });
  return summary;
}
