import { hasOwn, setOwn } from "./path-utils";
import { isJsonObject, type JsonObject, type JsonValue } from "./types";

const cloneJson = (value: JsonValue): JsonValue => {
  if (Array.isArray(value)) return value.map(cloneJson);
  if (isJsonObject(value)) {
    const copy: JsonObject = {};
    for (const key of Object.keys(value)) {
      setOwn(copy, key, cloneJson(value[key]));
    }
    return copy;
  }
  return value;
};

/**
 * Deep-merges `from` into `into` and returns the result.
 *
 * When both sides are objects, `into` is updated in place key by key and returned; keys that
 * only `into` holds are kept. In every other case a copy of `from` replaces `into`.
 */
export const mergeJson = (into: JsonValue, from: JsonValue): JsonValue => {
  if (isJsonObject(into) && isJsonObject(from)) {
    for (const key of Object.keys(from)) {
      const existing = hasOwn(into, key) ? into[key] : null;
      setOwn(into, key, mergeJson(existing, from[key]));
    }
    return into;
  }
  return cloneJson(from);
};
