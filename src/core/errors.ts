/*
Purpose: core error types shared by the pipeline, the HTTP layer and CLI output.
Assumptions: UserFacingError instances are safe to display to end users and to return over HTTP.
Usage: throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  input: "INPUT_ERROR",
  session: "SESSION_ERROR",
  export: "EXPORT_ERROR",
  config: "CONFIG_ERROR",
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

// Client-caused failures map to 400; everything else is the server's problem.
export function httpStatusForCode(code: UserFacingErrorCode): number {
  if (code === USER_FACING_ERROR_CODES.input || code === USER_FACING_ERROR_CODES.session) {
    return 400;
  }
  return 500;
}
