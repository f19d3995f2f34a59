import { isJsonObject, type JsonObject, type JsonValue } from "./types";

const ARRAY_INDEX_REGEX = /^(?:0|[1-9][0-9]*)$/;

const decodePointerToken = (token: string) => token.replace(/~1/g, "/").replace(/~0/g, "~");
const encodePointerToken = (token: string) => token.replace(/~/g, "~0").replace(/\//g, "~1");

export const hasOwn = (target: object, key: string) => Object.prototype.hasOwnProperty.call(target, key);

/**
 * Stores `value` as an own data property, so keys such as `__proto__` never reach the prototype chain.
 */
export const setOwn = (target: JsonObject, key: string, value: JsonValue) => {
  Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
};

/**
 * Splits a JSON Pointer into decoded tokens. Returns null when the pointer is not
 * the empty root pointer and does not start with `/`.
 */
export const splitPointer = (pointer: string): string[] | null => {
  if (pointer === "") return [];
  if (!pointer.startsWith("/")) return null;
  return pointer.slice(1).split("/").map(decodePointerToken);
};

export const joinPointer = (tokens: string[]) => {
  if (tokens.length === 0) return "";
  return `/${tokens.map(encodePointerToken).join("/")}`;
};

/**
 * Location of an existing value: the document itself, an array element or an object member.
 */
export type PointerSlot =
  | { kind: "root" }
  | { kind: "element"; container: JsonValue[]; index: number }
  | { kind: "member"; container: JsonObject; key: string };

const parseArrayIndex = (token: string, length: number): number | undefined => {
  if (!ARRAY_INDEX_REGEX.test(token)) return undefined;
  const index = Number(token);
  return index < length ? index : undefined;
};

/**
 * Walks a JSON Pointer and returns the slot holding the addressed value, or undefined when
 * a key is missing, an index is out of range or a scalar sits in the way.
 */
export const locatePointer = (document: JsonValue, pointer: string): PointerSlot | undefined => {
  const tokens = splitPointer(pointer);
  if (tokens === null) return undefined;

  let slot: PointerSlot = { kind: "root" };
  let current: JsonValue = document;
  for (const token of tokens) {
    if (Array.isArray(current)) {
      const index = parseArrayIndex(token, current.length);
      if (index === undefined) return undefined;
      slot = { kind: "element", container: current, index };
      current = current[index];
      continue;
    }
    if (isJsonObject(current)) {
      if (!hasOwn(current, token)) return undefined;
      slot = { kind: "member", container: current, key: token };
      current = current[token];
      continue;
    }
    return undefined;
  }
  return slot;
};

export const readSlot = (document: JsonValue, slot: PointerSlot): JsonValue => {
  switch (slot.kind) {
    case "root":
      return document;
    case "element":
      return slot.container[slot.index];
    case "member":
      return slot.container[slot.key];
  }
};

/**
 * Replaces the value held by `slot` and returns the (possibly new) document root.
 */
export const assignSlot = (document: JsonValue, slot: PointerSlot, value: JsonValue): JsonValue => {
  switch (slot.kind) {
    case "root":
      return value;
    case "element":
      slot.container[slot.index] = value;
      return document;
    case "member":
      setOwn(slot.container, slot.key, value);
      return document;
  }
};

/**
 * Safely retrieves a value at the JSON Pointer location, returning undefined when missing.
 */
export const resolvePointer = (document: JsonValue, pointer: string): JsonValue | undefined => {
  const slot = locatePointer(document, pointer);
  return slot === undefined ? undefined : readSlot(document, slot);
};

export { decodePointerToken, encodePointerToken };
