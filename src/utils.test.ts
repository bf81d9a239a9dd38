import { describe, it, expect } from "vitest";
import { formatArguments, formatDecimal, preview, truncate } from "./utils.js";

describe("truncate", () => {
  it("returns text unchanged when within limit", () => {
    expect(truncate("hello", 10)).toBe("hello");
  });

  it("truncates with ellipsis inside the limit", () => {
    expect(truncate("hello world", 8)).toBe("hello...");
  });

  it("cuts without ellipsis for tiny limits", () => {
    expect(truncate("hello", 3)).toBe("hel");
  });

  it("returns empty string for non-positive limits", () => {
    expect(truncate("hello", 0)).toBe("");
  });
});

describe("preview", () => {
  it("keeps short text", () => {
    expect(preview("Weather in Paris", 200)).toBe("Weather in Paris");
  });

  it("appends ellipsis after the cut", () => {
    expect(preview("abcdefgh", 5)).toBe("abcde...");
  });

  it("defaults to 200 characters", () => {
    const long = "x".repeat(250);
    expect(preview(long)).toBe("x".repeat(200) + "...");
  });
});

describe("formatArguments", () => {
  it("renders key=value pairs with JSON values", () => {
    expect(formatArguments({ location: "Paris", amount: 100 })).toBe('location="Paris", amount=100');
  });

  it("renders nothing for no arguments", () => {
    expect(formatArguments({})).toBe("");
  });
});

describe("formatDecimal", () => {
  it("keeps one fractional digit on whole numbers", () => {
    expect(formatDecimal(25)).toBe("25.0");
    expect(formatDecimal(-5)).toBe("-5.0");
    expect(formatDecimal(0)).toBe("0.0");
  });

  it("leaves fractional values as they are", () => {
    expect(formatDecimal(0.92)).toBe("0.92");
    expect(formatDecimal(512.3)).toBe("512.3");
  });
});
