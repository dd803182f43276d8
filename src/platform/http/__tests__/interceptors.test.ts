import { AxiosError } from "axios";
import { describe, expect, it } from "vitest";
import { requiresSession, transformError } from "../interceptors";
import {
  EmailExistsError,
  NetworkError,
  TimeoutError,
  TransportError,
} from "../errors";

describe("requiresSession", () => {
  it.each(["/sessions", "/users", "/callme", "/phoneactivate"])(
    "skips the token for %s",
    (path) => {
      expect(requiresSession(path)).toBe(false);
    }
  );

  it.each(["/posts/42/like", "/comments/1/like", "/posts/comment/3", "/posts/9"])(
    "requires the token for %s",
    (path) => {
      expect(requiresSession(path)).toBe(true);
    }
  );

  it("ignores the query string", () => {
    expect(requiresSession("/sessions?lang=ru")).toBe(false);
  });
});

describe("transformError", () => {
  it("maps ECONNABORTED to TimeoutError", () => {
    const error = transformError(new AxiosError("timeout of 100ms exceeded", "ECONNABORTED"));
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.code).toBe("TIMEOUT_ERROR");
  });

  it("maps ETIMEDOUT to TimeoutError", () => {
    expect(transformError(new AxiosError("connect ETIMEDOUT", "ETIMEDOUT"))).toBeInstanceOf(
      TimeoutError
    );
  });

  it("maps other axios errors to NetworkError", () => {
    const error = transformError(
      new AxiosError("getaddrinfo ENOTFOUND api.example.test", "ENOTFOUND")
    );
    expect(error).toBeInstanceOf(NetworkError);
    expect(error.details).toEqual({
      originalError: "getaddrinfo ENOTFOUND api.example.test",
      code: "ENOTFOUND",
    });
  });

  it("wraps foreign errors as TransportError", () => {
    const error = transformError(new Error("socket hang up"));
    expect(error).toBeInstanceOf(TransportError);
    expect(error.code).toBe("TRANSPORT_ERROR");
    expect(error.message).toBe("Request failed: socket hang up");
  });

  it("passes SDK errors through unchanged", () => {
    const original = new EmailExistsError([100]);
    expect(transformError(original)).toBe(original);
  });
});
