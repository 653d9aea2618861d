export type ErrorStage = "discovery" | "resolution" | "clone" | "analysis" | "persistence";

export class PystyleError extends Error {
  readonly stage: ErrorStage;

  constructor(stage: ErrorStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

export class DiscoveryError extends PystyleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("discovery", message, options);
  }
}

export class ResolutionError extends PystyleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("resolution", message, options);
  }
}

export class CloneError extends PystyleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("clone", message, options);
  }
}

export class AnalysisError extends PystyleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("analysis", message, options);
  }
}

export class PersistenceError extends PystyleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("persistence", message, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
