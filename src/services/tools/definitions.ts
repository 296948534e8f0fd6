// Conversions between tool schemas/results and what providers and clients see

import type { JsonSchemaProperty, ProviderTool } from '../../providers/types.js';
import type { CallInfo, ToolParameter, ToolResult, ToolSchema } from './types.js';

function toJsonSchemaProperty(param: ToolParameter): JsonSchemaProperty {
  const property: JsonSchemaProperty = {
    type: param.type,
    description: param.description,
  };

  if (param.default !== undefined) property.default = param.default;
  if (param.enum && param.enum.length > 0) property.enum = param.enum;
  if (param.minimum !== undefined) property.minimum = param.minimum;
  if (param.maximum !== undefined) property.maximum = param.maximum;
  if (param.pattern) property.pattern = param.pattern;

  return property;
}

export function toToolDefinition(schema: ToolSchema): ProviderTool {
  const properties: Record<string, JsonSchemaProperty> = {};
  for (const param of schema.parameters) {
    properties[param.name] = toJsonSchemaProperty(param);
  }

  return {
    type: 'function',
    function: {
      name: schema.name,
      description: schema.description,
      parameters: {
        type: 'object',
        properties,
        required: schema.parameters.filter(p => p.required).map(p => p.name),
      },
    },
  };
}

export interface WireToolResult {
  success: boolean;
  data?: unknown;
  error?: string;
  error_code?: string;
  metadata?: Record<string, unknown>;
  duration_ms: number;
}

export function toWireResult(result: ToolResult): WireToolResult {
  const wire: WireToolResult = { success: result.success, duration_ms: result.durationMs };
  if (result.data !== undefined) wire.data = result.data;
  if (result.error !== undefined) wire.error = result.error;
  if (result.errorCode !== undefined) wire.error_code = result.errorCode;
  if (result.metadata !== undefined) wire.metadata = result.metadata;
  return wire;
}

export interface WireCallInfo {
  tool_name: string;
  arguments: Record<string, unknown>;
  call_id?: string;
}

export function fromWireCall(call: WireCallInfo): CallInfo {
  return { toolName: call.tool_name, arguments: call.arguments, callId: call.call_id };
}

/**
 * Content of the `tool` message that reports a result back to the model.
 */
export function toToolMessageContent(result: ToolResult): string {
  if (result.success) {
    return JSON.stringify({ success: true, result: result.data ?? null });
  }
  return JSON.stringify({ success: false, error: result.error ?? 'unknown error', error_code: result.errorCode });
}
