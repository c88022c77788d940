/**
 * Classified failures surfaced to the user.
 *
 * Every error carries a stable `code` and a short remediation `hint` the CLI
 * prints under the message.
 */

export type ResumeErrorCode =
  | "VALIDATION_ERROR"
  | "CONFIG_ERROR"
  | "AUTHENTICATION_FAILURE"
  | "AUTHORIZATION_FAILURE"
  | "RATE_LIMITED"
  | "MODEL_UNAVAILABLE"
  | "TRANSPORT_TIMEOUT"
  | "TRANSPORT_UNREACHABLE"
  | "EMPTY_RESPONSE"
  | "UNEXPECTED_SERVER_ERROR";

export class ResumeError extends Error {
  readonly code: ResumeErrorCode;
  readonly hint: string;

  constructor(code: ResumeErrorCode, message: string, hint: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResumeError";
    this.code = code;
    this.hint = hint;
  }
}

export class ValidationError extends ResumeError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("VALIDATION_ERROR", message, "Fix the listed fields and try again.");
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class ConfigError extends ResumeError {
  constructor(message: string) {
    super("CONFIG_ERROR", message, "Run `resumecraft init` or set the variables in .env.");
    this.name = "ConfigError";
  }
}

export class AuthenticationFailure extends ResumeError {
  constructor(message: string) {
    super("AUTHENTICATION_FAILURE", message, "Check WATSONX_API_KEY.");
    this.name = "AuthenticationFailure";
  }
}

export class AuthorizationFailure extends ResumeError {
  constructor(message: string) {
    super("AUTHORIZATION_FAILURE", message, "Check that the key has access to WATSONX_PROJECT_ID.");
    this.name = "AuthorizationFailure";
  }
}

export class RateLimited extends ResumeError {
  constructor(message = "Rate limit exceeded.") {
    super("RATE_LIMITED", message, "Wait a moment and try again.");
    this.name = "RateLimited";
  }
}

export class ModelUnavailable extends ResumeError {
  constructor(modelId: string) {
    super("MODEL_UNAVAILABLE", `Model not available: ${modelId}`, "Try a different model (see `resumecraft catalog`).");
    this.name = "ModelUnavailable";
  }
}

export class TransportTimeout extends ResumeError {
  constructor(message: string, cause?: unknown) {
    super("TRANSPORT_TIMEOUT", message, "The service did not answer in time. Please try again.", { cause });
    this.name = "TransportTimeout";
  }
}

export class TransportUnreachable extends ResumeError {
  constructor(message: string, cause?: unknown) {
    super("TRANSPORT_UNREACHABLE", message, "Check your internet connection.", { cause });
    this.name = "TransportUnreachable";
  }
}

export class EmptyResponse extends ResumeError {
  constructor(message: string) {
    super("EMPTY_RESPONSE", message, "The model returned nothing. Try again or pick another model.");
    this.name = "EmptyResponse";
  }
}

export class UnexpectedServerError extends ResumeError {
  constructor(message: string, cause?: unknown) {
    super("UNEXPECTED_SERVER_ERROR", message, "Please try again; if it persists, check the service status.", { cause });
    this.name = "UnexpectedServerError";
  }
}
