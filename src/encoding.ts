import { stringifyJson } from "./json";
import type { JsonValue } from "./types";

/**
 * Serializations available for transformed records.
 */
export const OutputEncoding = {
  /**
   * Minified JSON, the form records are handed back to the host in (default).
   * @example
   * encodeDocument({ a: 1 }) // '{"a":1}'
   */
  JsonCompact: "json-compact",

  /**
   * Indented JSON, handy when inspecting records by hand.
   */
  JsonPretty: "json-pretty",
} as const;

export type OutputEncoding = typeof OutputEncoding[keyof typeof OutputEncoding];

export interface EncodeDocumentOptions {
  /** Defaults to `OutputEncoding.JsonCompact`. */
  encoding?: OutputEncoding;
  jsonIndent?: number; // default 2 when encoding is json-pretty
}

export const encodeDocument = (document: JsonValue, options: EncodeDocumentOptions = {}): string => {
  const encoding = options.encoding ?? OutputEncoding.JsonCompact;
  switch (encoding) {
    case OutputEncoding.JsonCompact:
      return stringifyJson(document);
    case OutputEncoding.JsonPretty:
      return stringifyJson(document, options.jsonIndent ?? 2);
  }
};
