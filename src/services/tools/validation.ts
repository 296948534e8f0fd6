// Tool input validation
// Pure checks of a raw argument map against a ToolSchema

import { RegistryErrorCode, ToolRegistryError, ValidationError } from './errors.js';
import type { ToolInput, ToolParameter, ToolSchema } from './types.js';

const NUMERIC_STRING = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isNaN(value) ? undefined : value;
  }
  if (typeof value === 'string' && NUMERIC_STRING.test(value)) {
    return Number(value);
  }
  return undefined;
}

function parseBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lower = value.toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
  }
  return undefined;
}

function compilePattern(param: ToolParameter, pattern: string, value: unknown): RegExp {
  try {
    return new RegExp(pattern);
  } catch {
    throw new ValidationError(param.name, `invalid regex pattern: ${pattern}`, value);
  }
}

function validateString(param: ToolParameter, value: unknown): void {
  if (typeof value !== 'string') {
    throw new ValidationError(param.name, 'expected string value', value);
  }

  if (param.enum && param.enum.length > 0 && !param.enum.includes(value)) {
    throw new ValidationError(param.name, `value must be one of: ${param.enum.join(', ')}`, value);
  }

  if (param.pattern) {
    const regex = compilePattern(param, param.pattern, value);
    if (!regex.test(value)) {
      throw new ValidationError(param.name, `value does not match pattern: ${param.pattern}`, value);
    }
  }
}

function validateNumber(param: ToolParameter, value: unknown): void {
  const num = parseNumber(value);
  if (num === undefined) {
    throw new ValidationError(param.name, 'expected number value', value);
  }
  if (param.minimum !== undefined && num < param.minimum) {
    throw new ValidationError(param.name, `value must be >= ${param.minimum}`, value);
  }
  if (param.maximum !== undefined && num > param.maximum) {
    throw new ValidationError(param.name, `value must be <= ${param.maximum}`, value);
  }
}

function validateParameter(param: ToolParameter, value: unknown): void {
  if (value === null) {
    if (param.required) {
      throw new ValidationError(param.name, 'required parameter cannot be null', value);
    }
    return;
  }

  switch (param.type) {
    case 'string':
      validateString(param, value);
      return;
    case 'number':
      validateNumber(param, value);
      return;
    case 'boolean':
      if (parseBoolean(value) === undefined) {
        throw new ValidationError(param.name, 'expected boolean value', value);
      }
      return;
    case 'object':
      if (!isPlainObject(value)) {
        throw new ValidationError(param.name, 'expected object value', value);
      }
      return;
    case 'array':
      if (!Array.isArray(value)) {
        throw new ValidationError(param.name, 'expected array value', value);
      }
      return;
  }
}

/**
 * Checks `input` against `schema` and throws the first violation found:
 * missing required parameters, then unknown keys, then per-parameter
 * content checks in schema order.
 */
export function validateInput(schema: ToolSchema, input: ToolInput): void {
  for (const param of schema.parameters) {
    if (param.required && input[param.name] === undefined) {
      throw new ValidationError(param.name, 'required parameter missing');
    }
  }

  const known = new Set(schema.parameters.map(p => p.name));
  for (const key of Object.keys(input)) {
    if (!known.has(key)) {
      throw new ValidationError(key, 'unknown parameter', input[key]);
    }
  }

  for (const param of schema.parameters) {
    const value = input[param.name];
    if (value === undefined) continue;
    validateParameter(param, value);
  }
}

function convertValue(param: ToolParameter, value: unknown): unknown {
  if (value === null) return null;

  switch (param.type) {
    case 'string':
      if (typeof value === 'string') return value;
      return typeof value === 'object' ? JSON.stringify(value) : String(value);
    case 'number': {
      const num = parseNumber(value);
      if (num === undefined) {
        throw new ValidationError(param.name, 'cannot convert to number', value);
      }
      return num;
    }
    case 'boolean': {
      const bool = parseBoolean(value);
      if (bool === undefined) {
        throw new ValidationError(param.name, 'cannot convert to boolean', value);
      }
      return bool;
    }
    case 'object':
    case 'array':
      return value;
  }
}

/**
 * Returns a canonical copy of `input`: defaults filled in for absent
 * optional parameters, scalar values coerced to their declared type and
 * unknown keys dropped.
 */
export function sanitizeInput(schema: ToolSchema, input: ToolInput): ToolInput {
  const sanitized: ToolInput = {};

  for (const param of schema.parameters) {
    const value = input[param.name];

    if (value === undefined) {
      if (param.default !== undefined) {
        sanitized[param.name] = param.default;
      }
      continue;
    }

    sanitized[param.name] = convertValue(param, value);
  }

  return sanitized;
}

const PARAMETER_TYPES = new Set(['string', 'number', 'boolean', 'array', 'object']);

function findSchemaProblem(schema: ToolSchema): string | null {
  if (!schema.name || !schema.name.trim()) {
    return 'tool name is empty';
  }

  const seen = new Set<string>();
  for (const param of schema.parameters) {
    if (!param.name) {
      return 'parameter name is empty';
    }
    if (seen.has(param.name)) {
      return `duplicate parameter '${param.name}'`;
    }
    seen.add(param.name);

    if (!PARAMETER_TYPES.has(param.type)) {
      return `parameter '${param.name}' has unsupported type '${String(param.type)}'`;
    }
    if (param.minimum !== undefined && param.maximum !== undefined && param.minimum > param.maximum) {
      return `parameter '${param.name}' has minimum greater than maximum`;
    }
    if (param.pattern) {
      try {
        new RegExp(param.pattern);
      } catch {
        return `parameter '${param.name}' has invalid pattern '${param.pattern}'`;
      }
    }
  }

  return null;
}

/**
 * Structural check run at registration time: names present, parameter names
 * unique, types known, bounds ordered and patterns compilable.
 */
export function assertValidSchema(schema: ToolSchema): void {
  const problem = findSchemaProblem(schema);
  if (problem) {
    throw new ToolRegistryError(RegistryErrorCode.INVALID_SCHEMA, `invalid schema for tool '${schema.name}': ${problem}`);
  }
}
