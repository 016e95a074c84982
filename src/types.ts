export type NodeLink = string;

export type NodeIdentity = string;

export interface RunParameters {
  timeoutSeconds: number;
  maxRetries: number;
  workerLimit: number;
}

export interface Source {
  url: string;
  timeoutSeconds: number;
  maxRetries: number;
}

export interface IdentityOptions {
  payloadLength: number;
  rawLength: number;
}

export interface AppConfig extends RunParameters {
  sources: string[];
  outputFile: string;
  identity: IdentityOptions;
}

export interface FetchOutcome {
  url: string;
  nodes: NodeLink[];
  attempts: number;
  error?: string;
}

export interface SourceOutcome extends FetchOutcome {
  accepted: number;
  duplicates: number;
}

export interface AggregateResult {
  nodes: NodeLink[];
  sources: SourceOutcome[];
  protocolCounts: Record<string, number>;
  duplicates: number;
  mode: "concurrent" | "serial";
}

export interface PublishResult {
  path: string;
  written: boolean;
  bytes: number;
  error?: string;
}

export interface RunSummary {
  sourcesTotal: number;
  sourcesSucceeded: number;
  sourcesFailed: number;
  nodes: number;
  duplicates: number;
  protocolCounts: Record<string, number>;
  elapsedMs: number;
  output: PublishResult;
}
