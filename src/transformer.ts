import { readField } from "./accessor";
import { RecordError, describeError } from "./errors";
import { parseJson } from "./json";
import { createLogger } from "./logger";
import { applyOperation, destinationOf, type Operation } from "./operations";
import type { JsonValue } from "./types";
import { writeAtPath } from "./writer";

const logger = createLogger("transformer");

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Applies `operations` in order to `document`. Each operation reads its source field, runs its
 * pattern and writes a non-empty result as a JSON string at its destination; later operations
 * see the writes of earlier ones. Returns the resulting document.
 */
export const transformDocument = (document: JsonValue, operations: readonly Operation[]): JsonValue => {
  let workingDocument = document;

  operations.forEach((operation, index) => {
    const text = readField(workingDocument, operation.source);
    if (!text) {
      logger.debug({ index, kind: operation.kind, source: operation.source }, "source field absent, skipping");
      return;
    }

    const result = applyOperation(operation, text);
    if (!result) {
      logger.debug({ index, kind: operation.kind, regex: operation.regex }, "pattern produced no value, skipping");
      return;
    }

    workingDocument = writeAtPath(workingDocument, destinationOf(operation), result);
  });

  return workingDocument;
};

/**
 * Decodes a record payload into a JSON document.
 *
 * @throws {RecordError} when the bytes are not valid UTF-8 or the text is not valid JSON.
 */
export const decodeRecord = (payload: Uint8Array | string): JsonValue => {
  let text: string;
  if (typeof payload === "string") {
    text = payload;
  } else {
    try {
      text = utf8Decoder.decode(payload);
    } catch (error) {
      throw new RecordError(`Record payload is not valid UTF-8: ${describeError(error)}`, { cause: error });
    }
  }

  try {
    return parseJson(text);
  } catch (error) {
    throw new RecordError(`Record payload is not valid JSON: ${describeError(error)}`, { cause: error });
  }
};

/**
 * Decodes one record and runs the operation list against it.
 */
export const transformRecord = (payload: Uint8Array | string, operations: readonly Operation[]): JsonValue =>
  transformDocument(decodeRecord(payload), operations);
