import { mergeJson } from "./merge";
import { assignSlot, decodePointerToken, joinPointer, locatePointer, readSlot, setOwn } from "./path-utils";
import type { JsonObject, JsonValue } from "./types";

/**
 * Writes `value` at `path`, creating missing object levels and merging with whatever already
 * lives there. Returns the resulting document, which is `document` itself unless the root had
 * to be replaced.
 *
 * The path is walked from the leaf towards the root: while the current path does not resolve,
 * its last segment is popped and `value` wrapped one level deeper. The first ancestor that
 * resolves receives the wrapped value through {@link mergeJson}, so a non-object ancestor
 * (array or scalar) is replaced by the wrap.
 *
 * A path without any `/` is malformed and leaves the document untouched.
 */
export const writeAtPath = (document: JsonValue, path: string, value: JsonValue): JsonValue => {
  if (!path.includes("/")) return document;

  let currentPath = path;
  let pending = value;
  for (;;) {
    const slot = locatePointer(document, currentPath);
    if (slot !== undefined) {
      return assignSlot(document, slot, mergeJson(readSlot(document, slot), pending));
    }

    const segments = currentPath.split("/").slice(1).map(decodePointerToken);
    const key = segments.pop();
    if (key === undefined) {
      return mergeJson(document, pending);
    }

    const wrapped: JsonObject = {};
    setOwn(wrapped, key, pending);
    pending = wrapped;

    if (segments.length === 0) {
      return mergeJson(document, pending);
    }
    currentPath = joinPointer(segments);
  }
};
