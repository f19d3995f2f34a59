import { LosslessNumber, isSafeNumber, parse, stringify } from "lossless-json";

import { isJsonValue, type JsonValue } from "./types";

const parseNumber = (text: string) => (isSafeNumber(text) ? Number(text) : new LosslessNumber(text));

/**
 * Parses JSON text, keeping integers beyond 2^53 and over-long decimals exact.
 */
export const parseJson = (text: string): JsonValue => {
  const parsed = parse(text, null, parseNumber);
  if (!isJsonValue(parsed)) {
    throw new TypeError("Parsed value is not a JSON value");
  }
  return parsed;
};

export const stringifyJson = (value: JsonValue, indent?: number): string => stringify(value, undefined, indent) ?? "null";
