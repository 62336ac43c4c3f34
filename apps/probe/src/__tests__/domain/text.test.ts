import { describe, it, expect } from "vitest";
import { characterCount, formatValue, maskApiKey, previewText } from "../../domain/text.js";

describe("maskApiKey", () => {
  it("should keep only the last four characters", () => {
    expect(maskApiKey("test-secret")).toBe("*******cret");
  });

  it("should print short keys as dummy", () => {
    expect(maskApiKey("abcd")).toBe("dummy");
    expect(maskApiKey("")).toBe("dummy");
  });

  it("should mask a five character key down to one star", () => {
    expect(maskApiKey("dummy")).toBe("*ummy");
  });
});

describe("previewText", () => {
  it("should leave short text alone", () => {
    expect(previewText("hello")).toBe("hello");
  });

  it("should keep exactly 200 characters without an ellipsis", () => {
    const text = "a".repeat(200);
    expect(previewText(text)).toBe(text);
  });

  it("should cut longer text and append an ellipsis", () => {
    expect(previewText("b".repeat(201))).toBe(`${"b".repeat(200)}...`);
  });

  it("should accept a custom limit", () => {
    expect(previewText("abcdef", 3)).toBe("abc...");
  });

  it("should count an emoji as one character", () => {
    const text = "🎉".repeat(150);
    expect(previewText(text)).toBe(text);
  });

  it("should never split a surrogate pair", () => {
    expect(previewText("🎉".repeat(201))).toBe(`${"🎉".repeat(200)}...`);
  });
});

describe("characterCount", () => {
  it("should count code points", () => {
    expect(characterCount("héllo")).toBe(5);
    expect(characterCount("ok 🎉")).toBe(4);
  });
});

describe("formatValue", () => {
  it("should render missing values as unknown", () => {
    expect(formatValue(undefined)).toBe("unknown");
  });

  it("should render strings as-is and others as JSON", () => {
    expect(formatValue("7h 59m")).toBe("7h 59m");
    expect(formatValue(true)).toBe("true");
    expect(formatValue(null)).toBe("null");
  });
});
