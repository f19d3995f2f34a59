import { loadOperations, type HostParams } from "./config";
import { describeError } from "./errors";
import { encodeDocument, type EncodeDocumentOptions } from "./encoding";
import { createLogger } from "./logger";
import type { Operation } from "./operations";
import { transformRecord } from "./transformer";

const logger = createLogger("mapper");

export interface InputRecord<K> {
  key: K;
  value: Uint8Array | string;
}

export interface OutputRecord<K> {
  key: K;
  value: string;
}

export interface RecordMapper {
  /** Operation list loaded at creation; frozen and shared by every `map` call. */
  readonly operations: readonly Operation[];
  map<K>(record: InputRecord<K>): OutputRecord<K>;
}

/**
 * Loads the operation list once from the host parameters and returns a mapper that transforms
 * one record per call. The key passes through untouched.
 *
 * @throws {ConfigurationError} when the `spec` parameter is missing or invalid.
 */
export const createRecordMapper = (params: HostParams, options: EncodeDocumentOptions = {}): RecordMapper => {
  const operations = loadOperations(params);

  return {
    operations,
    map<K>(record: InputRecord<K>): OutputRecord<K> {
      try {
        const document = transformRecord(record.value, operations);
        return { key: record.key, value: encodeDocument(document, options) };
      } catch (error) {
        logger.warn({ error: describeError(error) }, "record transformation failed");
        throw error;
      }
    },
  };
};
