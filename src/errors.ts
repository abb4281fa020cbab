/**
 * Error kinds surfaced by the Freshdesk tools.
 *
 * Every error carries a stable `code` so the tool dispatcher can report it
 * without inspecting class names.
 */

export type FreshdeskErrorCode =
  | 'validation_error'
  | 'invalid_parameter'
  | 'unknown_status'
  | 'not_found'
  | 'ambiguous_match'
  | 'upstream_error';

export class FreshdeskToolError extends Error {
  readonly code: FreshdeskErrorCode;

  constructor(code: FreshdeskErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends FreshdeskToolError {
  constructor(message: string, code: FreshdeskErrorCode = 'validation_error') {
    super(code, message);
  }
}

/** A helper parameter whose value has the wrong kind for its field. */
export class InvalidParameterError extends ValidationError {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(`Invalid value for ${parameter}: ${message}`, 'invalid_parameter');
    this.parameter = parameter;
  }
}

export class UnknownStatusError extends FreshdeskToolError {
  readonly token: string;

  constructor(token: string, known: readonly string[]) {
    super('unknown_status', `Unknown status "${token}". Expected one of: ${known.join(', ')}`);
    this.token = token;
  }
}

export class NotFoundError extends FreshdeskToolError {
  readonly term: string;

  constructor(term: string) {
    super('not_found', `No agent found matching "${term}"`);
    this.term = term;
  }
}

export interface AgentCandidate {
  id: number;
  name?: string;
  email?: string;
}

export class AmbiguousMatchError extends FreshdeskToolError {
  readonly term: string;
  readonly candidates: AgentCandidate[];

  constructor(term: string, candidates: AgentCandidate[]) {
    const names = candidates.map((c) => `${c.name ?? c.email ?? 'unnamed'} (${c.id})`).join(', ');
    super('ambiguous_match', `"${term}" matches ${candidates.length} agents: ${names}`);
    this.term = term;
    this.candidates = candidates;
  }
}

/** Non-2xx response from Freshdesk, or a 2xx body that does not have the expected shape. */
export class UpstreamError extends FreshdeskToolError {
  readonly status: number;
  readonly body: unknown;

  constructor(status: number, body: unknown, context: string) {
    const detail = typeof body === 'string' ? body : JSON.stringify(body);
    super('upstream_error', `${context} failed with status ${status}${detail ? `: ${detail.slice(0, 500)}` : ''}`);
    this.status = status;
    this.body = body;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof FreshdeskToolError) {
    return `[${error.code}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
