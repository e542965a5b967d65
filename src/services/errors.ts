export type ErrorCategory =
  | "configuration"
  | "data_format"
  | "validation"
  | "environment"
  | "telegram"
  | "not_found"
  | "unknown";

export const EXIT_CODES: Record<ErrorCategory, number> = {
  configuration: 1,
  data_format: 1,
  validation: 2,
  environment: 3,
  telegram: 1,
  not_found: 1,
  unknown: 1,
};

export class CliUtilsError extends Error {
  readonly category: ErrorCategory;
  readonly exitCode: number;

  constructor(
    message: string,
    opts: {
      category: ErrorCategory;
      exitCode?: number;
      cause?: unknown;
    },
  ) {
    super(message, { cause: opts.cause });
    this.name = "CliUtilsError";
    this.category = opts.category;
    this.exitCode = opts.exitCode ?? EXIT_CODES[opts.category];
  }
}

export class ConfigurationError extends CliUtilsError {
  constructor(message: string, cause?: unknown) {
    super(message, { category: "configuration", cause });
    this.name = "ConfigurationError";
  }
}

export class DataFormatError extends CliUtilsError {
  readonly filePath?: string;

  constructor(message: string, opts: { filePath?: string; cause?: unknown } = {}) {
    super(message, { category: "data_format", cause: opts.cause });
    this.name = "DataFormatError";
    this.filePath = opts.filePath;
  }
}

export class ValidationError extends CliUtilsError {
  constructor(message: string, exitCode?: number, cause?: unknown) {
    super(message, { category: "validation", exitCode, cause });
    this.name = "ValidationError";
  }
}

export class EnvironmentError extends CliUtilsError {
  readonly variable: string;

  constructor(variable: string, message?: string, cause?: unknown) {
    super(message ?? `Failed to update environment variable '${variable}'`, {
      category: "environment",
      cause,
    });
    this.name = "EnvironmentError";
    this.variable = variable;
  }
}

export class TelegramError extends CliUtilsError {
  constructor(message: string, exitCode?: number, cause?: unknown) {
    super(message, { category: "telegram", exitCode, cause });
    this.name = "TelegramError";
  }
}

// Lookups return null; callers that treat a miss as fatal raise this.
export class NotFoundError extends CliUtilsError {
  constructor(message: string) {
    super(message, { category: "not_found" });
    this.name = "NotFoundError";
  }
}

export function classifyError(err: unknown): CliUtilsError {
  if (err instanceof CliUtilsError) return err;
  if (err instanceof Error) {
    return new CliUtilsError(err.message, { category: "unknown", cause: err });
  }
  return new CliUtilsError(String(err), { category: "unknown" });
}

export function formatErrorForUI(error: CliUtilsError): string {
  switch (error.category) {
    case "configuration":
      return `Configuration error: ${error.message}`;
    case "data_format":
      return `Invalid settings file: ${error.message}`;
    case "environment":
      return `Environment error: ${error.message}`;
    default:
      return error.message;
  }
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
