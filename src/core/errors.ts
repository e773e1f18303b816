export class ConsoleError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ConsoleError";
  }
}

export class ConfigError extends ConsoleError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class CatalogReadError extends ConsoleError {
  constructor(
    message: string,
    public readonly targetPath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "CatalogReadError";
  }
}

export class CompositionParseError extends ConsoleError {
  constructor(
    message: string,
    public readonly composePath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "CompositionParseError";
  }
}

export class CacheCorruptError extends ConsoleError {
  constructor(
    message: string,
    public readonly cachePath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "CacheCorruptError";
  }
}

export class RuntimeUnavailableError extends ConsoleError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RuntimeUnavailableError";
  }
}

export class DockerError extends ConsoleError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DockerError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  catalog: "CATALOG_ERROR",
  cache: "CACHE_ERROR",
  runtime: "RUNTIME_ERROR",
  operation: "OPERATION_FAILED",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends ConsoleError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}

export function isUserFacingError(error: unknown): error is UserFacingError {
  return error instanceof UserFacingError;
}
