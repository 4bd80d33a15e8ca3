/**
 * Error taxonomy for the reasoning pipeline.
 *
 * Only ConfigurationError ever reaches a caller of `process`; the other
 * kinds are caught at the stage boundary and recorded on the StageResult.
 */

import type { StageErrorKind } from "../types/pipeline.js";

/**
 * Individual configuration issue, shaped after a zod issue.
 */
export interface ConfigurationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  code: string;
}

/**
 * Invalid or contradictory configuration. Raised before any stage runs.
 */
export class ConfigurationError extends Error {
  public readonly issues: ConfigurationIssue[];

  constructor(message: string, issues: ConfigurationIssue[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    const lines = [this.message];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * A reasoning, compaction or reranking call failed.
 */
export class CollaboratorError extends Error {
  constructor(
    public readonly collaborator: "agent" | "compactor" | "reranker",
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CollaboratorError";
  }
}

/**
 * Storage-layer fault. Readers treat it as a miss.
 */
export class CacheError extends Error {
  constructor(
    public readonly key: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CacheError";
  }
}

/**
 * The run was cancelled by the caller or a stage ran past its timeout.
 */
export class CancellationError extends Error {
  constructor(
    public readonly reason: "aborted" | "timeout",
    message?: string
  ) {
    super(message ?? (reason === "timeout" ? "Stage timed out" : "Run was cancelled"));
    this.name = "CancellationError";
  }
}

/**
 * Extract a message from any thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Classify a thrown value for the StageResult.
 */
export function classifyError(err: unknown): StageErrorKind {
  if (err instanceof CancellationError) return "cancellation";
  if (err instanceof CollaboratorError) return "collaborator";
  return "unexpected";
}
