export type ErrorKind =
  | 'bad_request'
  | 'unauthorized'
  | 'not_found'
  | 'rate_limited'
  | 'upstream_error'
  | 'network_error'
  | 'config_error';

/**
 * Structured failure returned to the MCP caller. Every per-call problem ends up
 * as one of these; only `config_error` is ever thrown, and only at startup.
 */
export interface ToolError {
  kind: ErrorKind;
  message: string;
  /** HTTP status of the upstream response, when there was one */
  status?: number;
  /** Message extracted from the upstream error body */
  upstreamMessage?: string;
  details?: Record<string, unknown>;
}

export type ApiResult<T> = { ok: true; data: T } | { ok: false; error: ToolError };

export function toolError(
  kind: ErrorKind,
  message: string,
  extra: Omit<ToolError, 'kind' | 'message'> = {}
): ToolError {
  return { kind, message, ...extra };
}

export function failure<T = never>(error: ToolError): ApiResult<T> {
  return { ok: false, error };
}

export function success<T>(data: T): ApiResult<T> {
  return { ok: true, data };
}

export class ConfigError extends Error {
  readonly kind = 'config_error' as const;

  constructor(
    message: string,
    readonly variable: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  toToolError(): ToolError {
    return toolError(this.kind, this.message, { details: { variable: this.variable } });
  }
}

/** Maps an upstream HTTP status to the error taxonomy */
export function kindForStatus(status: number): ErrorKind {
  if (status === 400) return 'bad_request';
  if (status === 401 || status === 403) return 'unauthorized';
  if (status === 404) return 'not_found';
  if (status === 429) return 'rate_limited';
  return 'upstream_error';
}
