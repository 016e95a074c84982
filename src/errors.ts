export type AggregationErrorCode = "NO_SOURCES" | "NO_NODES";

/** Run-level failure: the run ends without an artifact. */
export class AggregationError extends Error {
  constructor(
    message: string,
    readonly code: AggregationErrorCode
  ) {
    super(message);
    this.name = "AggregationError";
  }
}

export class NoSourcesError extends AggregationError {
  constructor(readonly rejected: string[] = []) {
    super("No valid sources configured", "NO_SOURCES");
    this.name = "NoSourcesError";
  }
}

export class NoNodesError extends AggregationError {
  constructor(readonly sourcesTried: number) {
    super(`No nodes aggregated from ${sourcesTried} source(s)`, "NO_NODES");
    this.name = "NoNodesError";
  }
}
