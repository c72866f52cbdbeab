/*
Purpose: error types shared by manifest loading, reporting, and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new ManifestLoadError(filePath, "..."); throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class InventoryError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "InventoryError";
  }
}

export class ManifestLoadError extends InventoryError {
  constructor(
    public readonly filePath: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ManifestLoadError";
  }
}

export class ReportError extends InventoryError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ReportError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  input: "INPUT_ERROR",
  report: "REPORT_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.cause = input.cause;
  }
}
