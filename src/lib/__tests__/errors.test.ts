import { describe, it, expect } from "vitest";
import {
  DecodeError,
  errorMessage,
  FitbitError,
  MalformedInputError,
  RequestFailedError,
  TransportError,
} from "../errors.js";

describe("error taxonomy", () => {
  it("gives every kind its code and the shared base class", () => {
    const cases: Array<[FitbitError, string, string]> = [
      [new MalformedInputError("bad"), "MALFORMED_INPUT", "MalformedInputError"],
      [new TransportError("down"), "TRANSPORT_ERROR", "TransportError"],
      [new DecodeError("garbled"), "DECODE_ERROR", "DecodeError"],
      [new RequestFailedError(new Response("", { status: 500 }), ""), "REQUEST_FAILED", "RequestFailedError"],
    ];

    for (const [error, code, name] of cases) {
      expect(error).toBeInstanceOf(FitbitError);
      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
    }
  });

  it("keeps the cause", () => {
    const cause = new TypeError("fetch failed");
    expect(new TransportError("down", { cause }).cause).toBe(cause);
  });

  it("truncates a long failure body in the message but keeps it whole on the error", () => {
    const body = "x".repeat(600);
    const error = new RequestFailedError(new Response(body, { status: 502 }), body);

    expect(error.message).toBe(`Fitbit API 502: ${"x".repeat(500)}`);
    expect(error.body).toHaveLength(600);
    expect(error.status).toBe(502);
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
