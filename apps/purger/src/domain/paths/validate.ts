/**
 * Path validation - pure functions.
 *
 * Turns the raw path list gathered by the publish pipeline into the ordered,
 * de-duplicated list every downstream component relies on.
 */

import { ValidationError, type PathIssue } from "../../errors.js";

export type ValidationResult =
  | { success: true; value: string[] }
  | { success: false; error: ValidationError };

/** Wildcard used for purge-everything requests */
export const PURGE_ALL_PATH = "/*";

// C0 controls and DEL. XML 1.0 cannot carry most of these at all.
const CONTROL_CHARACTER = /[\u0000-\u001f\u007f]/;
const LONE_SURROGATE = /[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/;

function inspectPath(raw: unknown, index: number): { path: string } | PathIssue {
  if (typeof raw !== "string") {
    return { index, path: String(raw), reason: "not_a_string" };
  }

  const path = raw.trim();

  if (path.length === 0) {
    return { index, path: raw, reason: "empty" };
  }
  if (!path.startsWith("/")) {
    return { index, path: raw, reason: "missing_leading_slash" };
  }
  if (CONTROL_CHARACTER.test(path)) {
    return { index, path: raw, reason: "control_character" };
  }
  if (LONE_SURROGATE.test(path)) {
    return { index, path: raw, reason: "invalid_unicode" };
  }

  return { path };
}

/**
 * Validate and normalize a list of paths.
 *
 * Duplicates are collapsed (first occurrence wins); malformed paths reject
 * the whole list so nothing is half-submitted.
 *
 * @example
 * validatePaths(["/a.html", " /a.html ", "/b.html"])
 * // { success: true, value: ["/a.html", "/b.html"] }
 */
export function validatePaths(raw: readonly unknown[]): ValidationResult {
  if (raw.length === 0) {
    return {
      success: false,
      error: new ValidationError("At least one path is required"),
    };
  }

  const issues: PathIssue[] = [];
  const seen = new Set<string>();
  const paths: string[] = [];

  raw.forEach((entry, index) => {
    const inspected = inspectPath(entry, index);
    if ("reason" in inspected) {
      issues.push(inspected);
      return;
    }
    if (!seen.has(inspected.path)) {
      seen.add(inspected.path);
      paths.push(inspected.path);
    }
  });

  if (issues.length > 0) {
    const first = issues[0];
    return {
      success: false,
      error: new ValidationError(
        `Invalid path at index ${first.index} (${first.reason}): ${JSON.stringify(first.path)}`,
        issues
      ),
    };
  }

  return { success: true, value: paths };
}

/**
 * True when the list asks for the whole site: a bare "/" or the "root" keyword.
 */
export function isPurgeAllRequest(raw: readonly unknown[]): boolean {
  return raw.some(
    (entry) =>
      typeof entry === "string" &&
      (entry.trim() === "/" || entry.trim().toLowerCase() === "root")
  );
}
