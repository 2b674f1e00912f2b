import path from "path";
import { invalidRequest } from "../errors";

const MAX_FILENAME_LENGTH = 255;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Validate a caller-supplied file name. The result is a single path segment
 * that cannot climb out of the directory it is joined onto.
 */
export function sanitizeFilename(raw: unknown, field = "filename"): string {
  if (typeof raw !== "string") {
    throw invalidRequest(`${field} must be a string`);
  }

  const name = raw.trim();

  if (!name) {
    throw invalidRequest(`${field} must not be empty`);
  }
  if (name.length > MAX_FILENAME_LENGTH) {
    throw invalidRequest(`${field} must be at most ${MAX_FILENAME_LENGTH} characters`);
  }
  if (CONTROL_CHARS.test(name)) {
    throw invalidRequest(`${field} contains control characters`);
  }
  if (name.includes("/") || name.includes("\\")) {
    throw invalidRequest(`${field} must not contain path separators`);
  }
  if (name === "." || name === ".." || name.startsWith("..")) {
    throw invalidRequest(`${field} must not reference a parent directory`);
  }
  if (path.posix.basename(name) !== name || path.win32.basename(name) !== name || name.includes(":")) {
    throw invalidRequest(`${field} is not a plain file name`);
  }

  return name;
}

/** Merge output names always end in `.pdf`. */
export function normalizeOutputName(raw: unknown): string {
  const name = sanitizeFilename(raw, "outputName");
  const withSuffix = name.toLowerCase().endsWith(".pdf") ? name : `${name}.pdf`;
  if (withSuffix.length > MAX_FILENAME_LENGTH) {
    throw invalidRequest(`outputName must be at most ${MAX_FILENAME_LENGTH} characters`);
  }
  return withSuffix;
}

export function pdfNameFor(sourceFilename: string): string {
  const stem = path.posix.parse(sourceFilename).name || "document";
  return `${stem}.pdf`;
}

export function uploadKey(ownerId: string, artifactId: string, filename: string) {
  return ["uploads", encodeSegment(ownerId), artifactId, filename].join("/");
}

export function outputKey(ownerId: string, taskId: string, filename: string) {
  return ["outputs", encodeSegment(ownerId), taskId, filename].join("/");
}

// Owner ids come from tokens; keep them to one key segment.
function encodeSegment(value: string) {
  const encoded = encodeURIComponent(value);
  return encoded === "." || encoded === ".." ? encoded.replace(/\./g, "%2E") : encoded;
}
