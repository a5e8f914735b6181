import type { ErrorKind, ToolFailure } from './types.js';

export class ToolhubError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ToolhubError';
  }
}

/** Base for errors that map onto a wire-level `ErrorKind`. */
export abstract class ClassifiedError extends ToolhubError {
  abstract readonly kind: ErrorKind;

  toFailure(): ToolFailure {
    return { kind: this.kind, message: this.message };
  }
}

export class ConnectionError extends ClassifiedError {
  readonly kind = 'ConnectionError' as const;
  constructor(server: string, detail: string, cause?: unknown) {
    super(`Server ${server} unreachable: ${detail}`, cause);
    this.name = 'ConnectionError';
  }
}

export class ToolNotFoundError extends ClassifiedError {
  readonly kind = 'ToolNotFound' as const;
  constructor(toolName: string, detail?: string) {
    super(`Tool not found: ${toolName}${detail ? ` (${detail})` : ''}`);
    this.name = 'ToolNotFoundError';
  }
}

export class ArgumentError extends ClassifiedError {
  readonly kind = 'ArgumentError' as const;
  constructor(toolName: string, detail: string) {
    super(`Invalid arguments for ${toolName}: ${detail}`);
    this.name = 'ArgumentError';
  }
}

export class ToolExecutionError extends ClassifiedError {
  readonly kind = 'ToolExecutionError' as const;
  constructor(toolName: string, detail: string, cause?: unknown) {
    super(`Tool ${toolName} failed: ${detail}`, cause);
    this.name = 'ToolExecutionError';
  }
}

export class ProviderUnavailableError extends ClassifiedError {
  readonly kind = 'ProviderUnavailable' as const;
  constructor(readonly provider: string, detail?: string, cause?: unknown) {
    super(`Provider unavailable: ${provider}${detail ? ` (${detail})` : ''}`, cause);
    this.name = 'ProviderUnavailableError';
  }
}

export class CancelledError extends ClassifiedError {
  readonly kind = 'Cancelled' as const;
  constructor(what: string) {
    super(`Cancelled: ${what}`);
    this.name = 'CancelledError';
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message || e.name;
  return String(e);
}

/**
 * Classifies anything thrown by a connector or tool.
 * Unclassified errors count as the backend reporting a failure.
 */
export function toToolFailure(e: unknown, toolName: string): ToolFailure {
  if (e instanceof ClassifiedError) return e.toFailure();
  return new ToolExecutionError(toolName, errorMessage(e)).toFailure();
}
