// src/errors.ts
export type PipelineStage = "config" | "search" | "summarize" | "publish" | "pipeline";

export class PipelineError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

/** Query, transport, auth or rate-limit failure of the discovery service. */
export class DiscoveryError extends PipelineError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("search", message, options);
    this.status = options?.status;
  }
}

export class GenerationError extends PipelineError {
  /** Position of the article being summarized, absent for the report call. */
  readonly articleIndex?: number;

  constructor(
    stage: "summarize" | "publish",
    message: string,
    options?: { cause?: unknown; articleIndex?: number }
  ) {
    super(stage, message, options);
    this.articleIndex = options?.articleIndex;
  }
}

export class PersistenceError extends PipelineError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super("publish", `Failed to write report to ${path}`, options);
    this.path = path;
  }
}

export class ConfigurationError extends PipelineError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("config", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class PipelineStateError extends PipelineError {
  constructor(message: string) {
    super("pipeline", message);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Log-friendly fields of a failure. */
export function errorDetails(e: unknown): Record<string, unknown> {
  if (!(e instanceof Error)) return { error: String(e) };
  return {
    error: e.message,
    name: e.name,
    ...(e instanceof PipelineError && { stage: e.stage }),
    ...(e.cause !== undefined && { cause: errorMessage(e.cause) }),
  };
}
