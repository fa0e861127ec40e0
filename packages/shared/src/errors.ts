import type { ZodError } from "zod";

export type CallgateErrorCode =
  | "validation_error"
  | "authentication_error"
  | "not_found"
  | "timeout"
  | "remote_service_error"
  | "run_failed";

export class CallgateError extends Error {
  public readonly code: CallgateErrorCode;

  public constructor(code: CallgateErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CallgateError";
    this.code = code;
  }
}

/** Malformed input, rejected before anything is sent to the service. */
export class ValidationError extends CallgateError {
  public readonly issues: string[];

  public constructor(message: string, issues: string[] = []) {
    super("validation_error", message);
    this.name = "ValidationError";
    this.issues = issues;
  }

  static fromZod(prefix: string, error: ZodError): ValidationError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    return new ValidationError(`${prefix}: ${issues.join("; ")}`, issues);
  }
}

export class AuthenticationError extends CallgateError {
  public constructor(message: string) {
    super("authentication_error", message);
    this.name = "AuthenticationError";
  }
}

export class NotFoundError extends CallgateError {
  public constructor(message: string) {
    super("not_found", message);
    this.name = "NotFoundError";
  }
}

export class TimeoutError extends CallgateError {
  public readonly timeoutMs: number;

  public constructor(message: string, timeoutMs: number) {
    super("timeout", message);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class RemoteServiceError extends CallgateError {
  public readonly statusCode?: number;
  public readonly body?: string;

  public constructor(
    message: string,
    opts?: { statusCode?: number; body?: string; cause?: unknown }
  ) {
    super("remote_service_error", message, { cause: opts?.cause });
    this.name = "RemoteServiceError";
    if (opts?.statusCode !== undefined) {
      this.statusCode = opts.statusCode;
    }
    if (opts?.body !== undefined) {
      this.body = opts.body;
    }
  }
}

export class RunFailedError extends CallgateError {
  public readonly runId: string;
  public readonly status: string;

  public constructor(runId: string, status: string) {
    super("run_failed", `Test run ${runId} ended with status ${status}`);
    this.name = "RunFailedError";
    this.runId = runId;
    this.status = status;
  }
}

export const isCallgateError = (value: unknown): value is CallgateError =>
  value instanceof CallgateError;
