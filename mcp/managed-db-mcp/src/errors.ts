/**
 * Bridge Errors
 *
 * Every failure a tool call can hit is raised as one of these and turned into
 * an error result by the tool registry. None of them stop the process.
 */

import type { ZodIssue } from 'zod';

export type BridgeErrorKind = 'config' | 'transport' | 'upstream' | 'validation' | 'malformed';

export class BridgeError extends Error {
  readonly kind: BridgeErrorKind;

  constructor(kind: BridgeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
    this.kind = kind;
  }
}

/** The upstream base URL is missing or unusable. */
export class ConfigError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
    this.name = 'ConfigError';
  }
}

/** No HTTP response was received: refused connection, DNS failure, timeout. */
export class TransportError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport', message, options);
    this.name = 'TransportError';
  }
}

/** The upstream API answered with a non-2xx status. */
export class UpstreamError extends BridgeError {
  readonly status: number;
  readonly detail: string;

  constructor(status: number, detail: string) {
    super('upstream', `API Error (${status}): ${detail}`);
    this.name = 'UpstreamError';
    this.status = status;
    this.detail = detail;
  }
}

/** Tool arguments failed validation; no request was sent. */
export class ValidationError extends BridgeError {
  readonly toolName: string;
  readonly issues: string[];

  constructor(toolName: string, issues: string[]) {
    super('validation', `Invalid arguments for ${toolName}: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.toolName = toolName;
    this.issues = issues;
  }
}

/** A 2xx response whose body was not JSON or lacked required fields. */
export class MalformedResponseError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('malformed', message, options);
    this.name = 'MalformedResponseError';
  }
}

export function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
