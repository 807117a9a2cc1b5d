import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { ClientConfig } from './config.js';
import { ApiResult, failure, kindForStatus, success, toolError } from './errors.js';
import { JsonValue, isJsonObject, tryParseJson } from './json.js';

export const USER_AGENT = 'CDISC-Library-MCP-Server/0.1.0';

const UPSTREAM_MESSAGE_LIMIT = 500;

export type QueryValue = string | number | boolean;

/** One upstream call: a path below the API root plus optional query parameters */
export interface RequestDescriptor {
  path: string;
  query?: Record<string, QueryValue>;
}

export interface ClientOptions {
  /** Replaces the network layer; used to stand in for the upstream in tests */
  adapter?: AxiosAdapter;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Fills `{name}` placeholders of a path template with URI-encoded values.
 * Throws when a placeholder has no value, which means a tool table entry is wrong.
 */
export function buildPath(template: string, params: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new Error(`Missing path parameter '${name}' for ${template}`);
    }
    return encodeURIComponent(value);
  });
}

/**
 * Thin GET-only client for the CDISC Library REST API. One call, one request:
 * nothing is cached and nothing is retried.
 */
export class CdiscClient {
  private readonly http: AxiosInstance;

  constructor(config: ClientConfig, options: ClientOptions = {}) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        'api-key': config.apiKey,
        Accept: 'application/json',
        'Cache-Control': 'no-cache',
        'User-Agent': USER_AGENT,
      },
      // Status codes and body decoding are handled below, not by axios
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  async get(request: RequestDescriptor, options: RequestOptions = {}): Promise<ApiResult<JsonValue>> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(request.path, {
        params: request.query,
        signal: options.signal,
      });
    } catch (error) {
      if (axios.isAxiosError(error) && !error.response) {
        const reason = error.code ? `${error.code}: ${error.message}` : error.message;
        return failure(
          toolError('network_error', `Unable to reach CDISC Library (${reason})`, {
            details: { path: request.path },
          })
        );
      }
      throw error;
    }

    return this.interpret(request, response);
  }

  private interpret(request: RequestDescriptor, response: AxiosResponse<unknown>): ApiResult<JsonValue> {
    const body = typeof response.data === 'string' ? response.data : '';
    const { status } = response;

    if (status < 200 || status >= 300) {
      const kind = kindForStatus(status);
      const details: Record<string, unknown> = { path: request.path };
      const retryAfter = response.headers['retry-after'];
      if (kind === 'rate_limited' && typeof retryAfter === 'string') {
        details.retryAfter = retryAfter;
      }
      return failure(
        toolError(kind, `CDISC Library returned HTTP ${status} for ${request.path}`, {
          status,
          upstreamMessage: extractUpstreamMessage(body),
          details,
        })
      );
    }

    if (body.trim() === '') {
      return failure(
        toolError('upstream_error', `CDISC Library returned an empty body for ${request.path}`, { status })
      );
    }

    const data = tryParseJson(body);
    if (data === undefined) {
      return failure(
        toolError('upstream_error', `CDISC Library returned a body that is not valid JSON for ${request.path}`, {
          status,
          upstreamMessage: truncate(body.trim()),
        })
      );
    }
    return success(data);
  }
}

function extractUpstreamMessage(body: string): string | undefined {
  const text = body.trim();
  if (text === '') {
    return undefined;
  }
  const parsed = tryParseJson(text);
  if (isJsonObject(parsed)) {
    for (const key of ['message', 'detail', 'error']) {
      const value = parsed[key];
      if (typeof value === 'string' && value.trim() !== '') {
        return truncate(value.trim());
      }
    }
  }
  return truncate(text);
}

function truncate(text: string): string {
  return text.length > UPSTREAM_MESSAGE_LIMIT ? `${text.slice(0, UPSTREAM_MESSAGE_LIMIT)}...` : text;
}
