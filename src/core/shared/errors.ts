// src/core/shared/errors.ts
import type { ActionKind } from '../actions/types.js';

/**
 * Base class for every error the agent raises on purpose.
 */
export class AgentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * An action could not be constructed from the given kind and parameters.
 */
export class ValidationError extends AgentError {}

export class InvalidKindError extends ValidationError {
  constructor(public readonly kind: string) {
    super(`Unsupported action kind: ${kind}`);
  }
}

export class MissingFieldError extends ValidationError {
  constructor(public readonly kind: ActionKind, public readonly field: string) {
    super(`Action kind '${kind}' requires field '${field}'`);
  }
}

export class InvalidFieldError extends ValidationError {
  constructor(
    public readonly kind: ActionKind,
    public readonly field: string,
    detail: string
  ) {
    super(`Action kind '${kind}' has an invalid '${field}': ${detail}`);
  }
}

export class CaptureError extends AgentError {}

export class DecisionError extends AgentError {}

export class DecisionTimeoutError extends DecisionError {
  constructor(public readonly timeoutMs: number) {
    super(`Decision did not arrive within ${timeoutMs}ms`);
  }
}

export class ActionExecutionError extends AgentError {
  constructor(public readonly kind: ActionKind, cause: unknown, message?: string) {
    super(message ?? `Action ${kind} failed: ${describeCause(cause)}`, { cause });
  }
}

export class OutOfRangeError extends ActionExecutionError {
  constructor(public readonly index: number, public readonly pageCount: number) {
    super(
      'switch_tab',
      undefined,
      `Tab index ${index} is out of range (${pageCount} open page${pageCount === 1 ? '' : 's'})`
    );
  }
}

export class SessionError extends AgentError {}

export class ConfigError extends AgentError {}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
