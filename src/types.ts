import { isLosslessNumber, type LosslessNumber } from "lossless-json";

/** Numbers outside the safe double range keep their source text as a `LosslessNumber`. */
export type JsonPrimitive = string | number | boolean | null | LosslessNumber;

export type JsonObject = { [key: string]: JsonValue };

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export const isJsonObject = (value: unknown): value is JsonObject =>
  value !== null && typeof value === "object" && !Array.isArray(value) && !isLosslessNumber(value);

export const isJsonValue = (value: unknown): value is JsonValue => {
  if (value === null || isLosslessNumber(value)) return true;
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
};
