import type { ErrorCode } from "../types/index.js";

export class FitbitError extends Error {
  code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FitbitError";
    this.code = code;
  }
}

/** The payload could not be encoded or the address could not be built. */
export class MalformedInputError extends FitbitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "MALFORMED_INPUT", options);
    this.name = "MalformedInputError";
  }
}

export class TransportError extends FitbitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "TRANSPORT_ERROR", options);
    this.name = "TransportError";
  }
}

/**
 * Non-2xx response. The body has already been drained into `body`;
 * `response` is kept for its status line and headers.
 */
export class RequestFailedError extends FitbitError {
  status: number;
  response: Response;
  body: string;

  constructor(response: Response, body: string) {
    super(
      `Fitbit API ${response.status}: ${body.slice(0, 500)}`,
      "REQUEST_FAILED",
    );
    this.name = "RequestFailedError";
    this.status = response.status;
    this.response = response;
    this.body = body;
  }
}

export class DecodeError extends FitbitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "DECODE_ERROR", options);
    this.name = "DecodeError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
