import type { BackendKind } from "./backend.js";

export interface BackendErrorContext {
  backend?: BackendKind;
  value?: unknown;
}

export class BackendError extends Error {
  readonly backend: BackendKind | null;
  readonly value: unknown;

  constructor(message: string, context: BackendErrorContext = {}) {
    super(context.backend ? `[${context.backend}] ${message}` : message);
    this.name = new.target.name;
    this.backend = context.backend ?? null;
    this.value = context.value;
  }
}

/** Invalid selection, spec, handle or scheduler output. Never retried. */
export class ConfigError extends BackendError {}

export class SubmissionError extends BackendError {
  readonly tool: string;
  readonly attempts: number;

  constructor(message: string, context: BackendErrorContext & { tool: string; attempts: number }) {
    super(message, context);
    this.tool = context.tool;
    this.attempts = context.attempts;
  }
}

export class StatusQueryError extends BackendError {
  readonly tool: string;

  constructor(message: string, context: BackendErrorContext & { tool: string }) {
    super(message, context);
    this.tool = context.tool;
  }
}
