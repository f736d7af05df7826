export type EngineErrorCode = "BUNDLE_INVALID" | "QUEUE_CORRUPTION" | "SNAPSHOT_INVALID" | "CONFIG_INVALID";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class BundleValidationError extends EngineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("BUNDLE_INVALID", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

export class QueueCorruptionError extends EngineError {
  constructor(message: string) {
    super("QUEUE_CORRUPTION", message);
  }
}

export class SnapshotValidationError extends EngineError {
  constructor(message: string) {
    super("SNAPSHOT_INVALID", message);
  }
}

export class ConfigError extends EngineError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}
