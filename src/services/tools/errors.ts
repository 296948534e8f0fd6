// Tool-level errors
// These never reach HTTP callers directly: the executor folds them into failed ToolResults

export enum ToolErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  TOOL_UNAVAILABLE = 'TOOL_UNAVAILABLE',
  TIMEOUT = 'TIMEOUT',
  PANIC = 'PANIC',
  NIL_RESULT = 'NIL_RESULT',
  CANCELLED = 'CANCELLED',
  EXECUTION_ERROR = 'EXECUTION_ERROR',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
}

export enum RegistryErrorCode {
  NIL_TOOL = 'NIL_TOOL',
  EMPTY_TOOL_NAME = 'EMPTY_TOOL_NAME',
  TOOL_ALREADY_EXISTS = 'TOOL_ALREADY_EXISTS',
  INVALID_SCHEMA = 'INVALID_SCHEMA',
  REGISTRY_SEALED = 'REGISTRY_SEALED',
}

export class ValidationError extends Error {
  constructor(
    public parameter: string,
    public reason: string,
    public value?: unknown
  ) {
    super(`validation error for parameter '${parameter}': ${reason}`);
    this.name = 'ValidationError';
  }
}

export class ExecutionError extends Error {
  constructor(
    public toolName: string,
    public code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExecutionError';
  }

  override toString(): string {
    if (this.cause instanceof Error) {
      return `tool '${this.toolName}' execution failed [${this.code}]: ${this.message} (caused by: ${this.cause.message})`;
    }
    return `tool '${this.toolName}' execution failed [${this.code}]: ${this.message}`;
  }
}

export class ToolRegistryError extends Error {
  constructor(
    public code: RegistryErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ToolRegistryError';
  }
}
