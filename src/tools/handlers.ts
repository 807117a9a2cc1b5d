import { CallToolResult, ErrorCode, McpError, Tool } from '@modelcontextprotocol/sdk/types.js';
import { CdiscClient } from '../client.js';
import { ApiResult, ToolError, failure, success, toolError } from '../errors.js';
import { renderPayload } from '../formatters.js';
import { SEGMENT_PATTERN, TOOL_SPECS, ToolArgs, ToolSpec, findTool, inputSchemaFor } from './definitions.js';

export interface ExecuteOptions {
  maxResponseChars: number;
  signal?: AbortSignal;
}

export function listTools(): Tool[] {
  return TOOL_SPECS.map((spec) => ({
    name: spec.name,
    description: spec.description,
    inputSchema: inputSchemaFor(spec),
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks raw call arguments against a tool's declared parameters.
 * Blank optional values count as omitted; extra keys are ignored.
 */
export function validateArgs(spec: ToolSpec, raw: unknown): ApiResult<ToolArgs> {
  if (raw !== undefined && raw !== null && !isRecord(raw)) {
    return failure(toolError('bad_request', 'Tool arguments must be an object'));
  }
  const input: Record<string, unknown> = isRecord(raw) ? raw : {};
  const args: Record<string, string> = {};

  for (const param of spec.parameters) {
    const value = input[param.name];
    if (value === undefined || value === null || (typeof value === 'string' && value.trim() === '')) {
      if (param.required) {
        return failure(
          toolError('bad_request', `Missing required parameter '${param.name}'`, {
            details: { parameter: param.name },
          })
        );
      }
      continue;
    }
    if (typeof value !== 'string') {
      return failure(
        toolError('bad_request', `Parameter '${param.name}' must be a string, got ${typeof value}`, {
          details: { parameter: param.name },
        })
      );
    }

    const trimmed = value.trim();
    if (param.enum) {
      if (!param.enum.includes(trimmed)) {
        return failure(
          toolError(
            'bad_request',
            `Invalid ${param.name} '${trimmed}'. Valid values: ${param.enum.join(', ')}`,
            { details: { parameter: param.name, accepted: [...param.enum] } }
          )
        );
      }
    } else {
      const pattern = param.pattern ?? SEGMENT_PATTERN;
      if (!new RegExp(pattern).test(trimmed)) {
        return failure(
          toolError('bad_request', `Invalid ${param.name} '${trimmed}': expected to match ${pattern}`, {
            details: { parameter: param.name, pattern },
          })
        );
      }
    }
    args[param.name] = trimmed;
  }

  const problem = spec.check?.(args);
  return problem ? failure(problem) : success(args);
}

export function errorResult(error: ToolError): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify({ error }, null, 2) }],
    isError: true,
  };
}

/**
 * Runs one tool call: validate, issue a single upstream GET, format, render.
 * Per-call failures come back as error results; an unknown tool name is a protocol error.
 */
export async function executeTool(
  client: CdiscClient,
  name: string,
  rawArgs: unknown,
  options: ExecuteOptions
): Promise<CallToolResult> {
  const spec = findTool(name);
  if (!spec) {
    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }

  const validated = validateArgs(spec, rawArgs);
  if (!validated.ok) {
    return errorResult(validated.error);
  }

  const request = spec.route(validated.data);
  const result = await client.get(request, { signal: options.signal });
  if (!result.ok) {
    const { kind, status } = result.error;
    console.error(`[tool] ${name} failed: ${kind}${status === undefined ? '' : ` (HTTP ${status})`} ${request.path}`);
    return errorResult(result.error);
  }

  return {
    content: [{ type: 'text', text: renderPayload(spec.format(result.data), options.maxResponseChars) }],
  };
}
