/** Failures detected before any process is started. */
export enum ToolErrorCode {
  UNKNOWN_TOOL = "UNKNOWN_TOOL",
  MISSING_ARGUMENT = "MISSING_ARGUMENT",
  UNEXPECTED_ARGUMENT = "UNEXPECTED_ARGUMENT",
  INVALID_VALUE = "INVALID_VALUE",
}

/** Failures of the process itself, as opposed to a nonzero exit reported by the CLI. */
export enum ProcessErrorCode {
  EXECUTABLE_NOT_FOUND = "EXECUTABLE_NOT_FOUND",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  LAUNCH_FAILED = "LAUNCH_FAILED",
  TIMEOUT = "TIMEOUT",
}

export interface ToolErrorContext {
  field?: string;
  allowed?: string[];
  received?: unknown;
}

export class ToolError extends Error {
  readonly code: ToolErrorCode;
  readonly tool: string;
  readonly context: ToolErrorContext;

  constructor(code: ToolErrorCode, tool: string, message: string, context: ToolErrorContext = {}) {
    super(message);
    this.name = "ToolError";
    this.code = code;
    this.tool = tool;
    this.context = context;
  }
}

export class ProcessError extends Error {
  readonly code: ProcessErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ProcessErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ProcessError";
    this.code = code;
    this.context = context;
  }
}
