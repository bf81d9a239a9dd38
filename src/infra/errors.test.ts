import { describe, it, expect } from "vitest";
import {
  AppError,
  CatalogUnavailableError,
  ConfigError,
  ReasoningUnavailableError,
  ToolArgumentError,
  ToolInvocationError,
  TranscriptError,
  errorMessage,
  formatError,
} from "./errors.js";

describe("AppError", () => {
  it("sets message, code and name", () => {
    const err = new AppError("something failed", "FAIL_CODE");
    expect(err.message).toBe("something failed");
    expect(err.code).toBe("FAIL_CODE");
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
  });
});

describe("subclasses", () => {
  it("ConfigError carries CONFIG_ERROR", () => {
    const err = new ConfigError("bad config");
    expect(err.code).toBe("CONFIG_ERROR");
    expect(err).toBeInstanceOf(AppError);
  });

  it("CatalogUnavailableError keeps its cause", () => {
    const cause = new Error("ECONNREFUSED");
    const err = new CatalogUnavailableError("tool provider unreachable", cause);
    expect(err.name).toBe("CatalogUnavailableError");
    expect(err.code).toBe("CATALOG_UNAVAILABLE");
    expect(err.cause).toBe(cause);
  });

  it("ReasoningUnavailableError carries REASONING_UNAVAILABLE", () => {
    const err = new ReasoningUnavailableError("401 Unauthorized");
    expect(err.code).toBe("REASONING_UNAVAILABLE");
    expect(err).toBeInstanceOf(ReasoningUnavailableError);
  });

  it("ToolInvocationError records the tool name", () => {
    const err = new ToolInvocationError("get_weather", "HTTP 500");
    expect(err.toolName).toBe("get_weather");
    expect(err.code).toBe("TOOL_INVOCATION_FAILED");
  });

  it("ToolArgumentError prefixes the tool name", () => {
    const err = new ToolArgumentError("book_movie", "seats: Expected number");
    expect(err.message).toBe("Invalid arguments for book_movie: seats: Expected number");
    expect(err.code).toBe("TOOL_ARGUMENT_INVALID");
  });

  it("TranscriptError carries TRANSCRIPT_INVALID", () => {
    expect(new TranscriptError("x").code).toBe("TRANSCRIPT_INVALID");
  });
});

describe("errorMessage", () => {
  it("uses the message of Error instances", () => {
    expect(errorMessage(new Error("oops"))).toBe("oops");
  });

  it("stringifies other values", () => {
    expect(errorMessage(42)).toBe("42");
    expect(errorMessage(null)).toBe("null");
  });
});

describe("formatError", () => {
  it("returns the stack trace for Error instances", () => {
    const result = formatError(new Error("oops"));
    expect(result).toContain("Error: oops");
  });

  it("converts non-errors to strings", () => {
    expect(formatError("plain string")).toBe("plain string");
    expect(formatError(undefined)).toBe("undefined");
  });
});
