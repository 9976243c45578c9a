// ============================================================
// Error Classes
// ============================================================
// Every error that should reach the client as something other
// than a 500 is an AppError. The error handler middleware reads
// `statusCode` and `details` and renders:
//
//   { success: false, message: "...", errors?: [...] }
//
//   AuthenticationError   → 401 (missing / invalid / expired credential)
//   ValidationError       → 400 (missing or malformed field)
//   NotFoundError         → 404 (unknown route or resource)
//   UpstreamServiceError  → 502 (Gemini / Pinecone failed)
//   UpstreamTimeoutError  → 503 (Gemini / Pinecone did not answer in time)
// ============================================================

export interface FieldIssue {
  field: string;
  message: string;
}

export class AppError extends Error {
  readonly statusCode: number;
  readonly details?: FieldIssue[];

  constructor(message: string, statusCode: number, details?: FieldIssue[]) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class AuthenticationError extends AppError {
  constructor(message = "Authentication credentials were not provided.") {
    super(message, 401);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: FieldIssue[]) {
    super(message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(message, 404);
  }
}

export class UpstreamServiceError extends AppError {
  readonly service: string;

  constructor(service: string, message: string, statusCode = 502) {
    super(`${service} request failed: ${message}`, statusCode);
    this.service = service;
  }
}

export class UpstreamTimeoutError extends UpstreamServiceError {
  constructor(service: string, timeoutMs: number) {
    super(service, `timed out after ${timeoutMs}ms`, 503);
  }
}

export class ConfigError extends Error {
  readonly keys: string[];

  constructor(issues: FieldIssue[]) {
    super(
      `Invalid configuration: ${issues.map((i) => `${i.field} (${i.message})`).join(", ")}`
    );
    this.name = "ConfigError";
    this.keys = issues.map((i) => i.field);
  }
}

/** Message of anything thrown, for logs and wrapped errors. */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
