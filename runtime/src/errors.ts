export type ConductorErrorCode =
  | "UNKNOWN_TOOL"
  | "INVALID_DEPENDENCY"
  | "STEP_TIMEOUT"
  | "INVALID_ARGUMENTS"
  | "SINK_UNAVAILABLE"
  | "CONFIG_INVALID";

/**
 * Base class for every error the engine raises or records.
 */
export class ConductorError extends Error {
  readonly code: ConductorErrorCode;

  constructor(code: ConductorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConductorError";
    this.code = code;
  }
}

export class UnknownToolError extends ConductorError {
  readonly toolName: string;

  constructor(toolName: string) {
    super("UNKNOWN_TOOL", `Unknown tool: ${toolName}`);
    this.name = "UnknownToolError";
    this.toolName = toolName;
  }
}

export class InvalidDependencyError extends ConductorError {
  readonly stepIndex: number;
  readonly dependency: number;

  constructor(stepIndex: number, dependency: number) {
    super(
      "INVALID_DEPENDENCY",
      `Step ${stepIndex} depends on step ${dependency}, which is not an earlier step`,
    );
    this.name = "InvalidDependencyError";
    this.stepIndex = stepIndex;
    this.dependency = dependency;
  }
}

export class StepTimeoutError extends ConductorError {
  readonly timeoutSeconds: number;

  constructor(timeoutSeconds: number) {
    super("STEP_TIMEOUT", `timed out after ${timeoutSeconds}s`);
    this.name = "StepTimeoutError";
    this.timeoutSeconds = timeoutSeconds;
  }
}

export class InvalidArgumentsError extends ConductorError {
  readonly toolName: string;

  constructor(toolName: string, issues: string) {
    super("INVALID_ARGUMENTS", `Invalid arguments for ${toolName}: ${issues}`);
    this.name = "InvalidArgumentsError";
    this.toolName = toolName;
  }
}

export class SinkUnavailableError extends ConductorError {
  readonly sink: "event" | "artifact";

  constructor(sink: "event" | "artifact", message: string, options?: { cause?: unknown }) {
    super("SINK_UNAVAILABLE", message, options);
    this.name = "SinkUnavailableError";
    this.sink = sink;
  }
}

export class ConfigError extends ConductorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
