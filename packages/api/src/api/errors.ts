import { StoreError } from "@didscan/db";

// ============================================================
// API error taxonomy
// ============================================================

export abstract class ApiError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;
}

export class NotFoundError extends ApiError {
  readonly status = 404;
  readonly code = "NotFound";

  constructor(message = "Resource not found") {
    super(message);
    this.name = "NotFoundError";
  }
}

export class InvalidFilterValueError extends ApiError {
  readonly status = 400;
  readonly code = "InvalidFilterValue";

  constructor(readonly filter: string, reason: string, parameter = `filter[${filter}]`) {
    super(`Invalid value for ${parameter}: ${reason}`);
    this.name = "InvalidFilterValueError";
  }
}

export class ParameterRequiredError extends ApiError {
  readonly status = 400;
  readonly code = "ParameterRequired";

  constructor(readonly parameter: string) {
    super(`Required parameter missing: ${parameter}`);
    this.name = "ParameterRequiredError";
  }
}

/** Chain RPC failed; callers omit the affected fields instead of surfacing this */
export class UpstreamUnavailableError extends ApiError {
  readonly status = 502;
  readonly code = "UpstreamUnavailable";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamUnavailableError";
  }
}

export interface ErrorBody {
  errors: { status: number; code: string; title: string }[];
  data?: null;
}

/** Map any thrown value to an HTTP status and JSON body */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof ApiError) {
    const body: ErrorBody = { errors: [{ status: err.status, code: err.code, title: err.message }] };
    if (err instanceof NotFoundError) body.data = null;
    return { status: err.status, body };
  }
  if (err instanceof StoreError) {
    return {
      status: 500,
      body: { errors: [{ status: 500, code: "StoreError", title: "Failed to query the data store" }] },
    };
  }
  return {
    status: 500,
    body: { errors: [{ status: 500, code: "InternalError", title: "Internal server error" }] },
  };
}
