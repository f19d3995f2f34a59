import { stringifyJson } from "./json";
import { resolvePointer } from "./path-utils";
import type { JsonValue } from "./types";

/**
 * Reads the value addressed by the JSON Pointer `path` as text.
 *
 * Strings come back verbatim, any other value as its compact JSON serialization. A path that
 * does not resolve reads as the empty string, which callers treat as "field absent".
 */
export const readField = (document: JsonValue, path: string): string => {
  const value = resolvePointer(document, path);
  if (value === undefined) return "";
  return typeof value === "string" ? value : stringifyJson(value);
};
