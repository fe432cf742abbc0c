import { describe, it, expect } from "vitest";
import { isPurgeAllRequest, validatePaths } from "../../../domain/paths/validate.js";
import { ValidationError } from "../../../errors.js";

describe("validatePaths", () => {
  it("should reject an empty list before anything else runs", () => {
    const result = validatePaths([]);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.kind).toBe("validation");
    expect(result.error.message).toBe("At least one path is required");
  });

  it("should trim and de-duplicate, keeping first occurrence order", () => {
    const result = validatePaths(["/b.html", "/a.html", " /b.html ", "/c.html", "/a.html"]);
    expect(result).toEqual({ success: true, value: ["/b.html", "/a.html", "/c.html"] });
  });

  it("should accept non-ASCII paths and surrogate pairs", () => {
    const result = validatePaths(["/café/日本語.html", "/emoji/😀.png"]);
    expect(result).toEqual({ success: true, value: ["/café/日本語.html", "/emoji/😀.png"] });
  });

  it("should accept XML special characters unchanged", () => {
    const result = validatePaths(["/test<file>.html", "/test&page.html"]);
    expect(result).toEqual({ success: true, value: ["/test<file>.html", "/test&page.html"] });
  });

  describe("rejections", () => {
    const reasonFor = (raw: unknown): string | undefined => {
      const result = validatePaths([raw]);
      return result.success ? undefined : result.error.issues[0]?.reason;
    };

    it("should reject a path without a leading slash", () => {
      const result = validatePaths(["a.html"]);
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.message).toBe('Invalid path at index 0 (missing_leading_slash): "a.html"');
    });

    it("should reject blank paths", () => {
      expect(reasonFor("   ")).toBe("empty");
      expect(reasonFor("")).toBe("empty");
    });

    it("should reject control characters", () => {
      expect(reasonFor("/a\nb.html")).toBe("control_character");
      expect(reasonFor("/a\u0000b.html")).toBe("control_character");
      expect(reasonFor("/a\u007fb.html")).toBe("control_character");
    });

    it("should reject unpaired surrogates", () => {
      expect(reasonFor("/a\ud800b.html")).toBe("invalid_unicode");
      expect(reasonFor("/a\udc00b.html")).toBe("invalid_unicode");
    });

    it("should reject non-string entries", () => {
      expect(reasonFor(42)).toBe("not_a_string");
      expect(reasonFor(null)).toBe("not_a_string");
    });

    it("should report every invalid entry and reject the whole list", () => {
      const result = validatePaths(["/ok.html", "bad.html", "", "/also-ok.html"]);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.issues).toEqual([
        { index: 1, path: "bad.html", reason: "missing_leading_slash" },
        { index: 2, path: "", reason: "empty" },
      ]);
    });
  });
});

describe("isPurgeAllRequest", () => {
  it("should detect a bare slash", () => {
    expect(isPurgeAllRequest(["/a.html", " / "])).toBe(true);
  });

  it("should detect the root keyword case-insensitively", () => {
    expect(isPurgeAllRequest(["ROOT"])).toBe(true);
  });

  it("should ignore ordinary paths", () => {
    expect(isPurgeAllRequest(["/a.html", "/root.html", 7])).toBe(false);
  });
});
