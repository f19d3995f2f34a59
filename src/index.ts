export type { JsonObject, JsonPrimitive, JsonValue } from "./types";

export {
  decodePointerToken,
  encodePointerToken,
  joinPointer,
  locatePointer,
  resolvePointer,
  splitPointer,
  type PointerSlot,
} from "./path-utils";

export { readField } from "./accessor";
export { mergeJson } from "./merge";
export { writeAtPath } from "./writer";

export { compilePattern, expandTemplate } from "./regex";
export {
  applyOperation,
  createCaptureOperation,
  createReplaceOperation,
  destinationOf,
  type CaptureOperation,
  type Operation,
  type OperationKind,
  type ReplaceOperation,
} from "./operations";

export { transformDocument, transformRecord, decodeRecord } from "./transformer";

export {
  SPEC_PARAM,
  loadOperations,
  operationListSchema,
  operationSpecSchema,
  parseOperations,
  type HostParams,
  type OperationSpec,
} from "./config";

export { createRecordMapper, type InputRecord, type OutputRecord, type RecordMapper } from "./mapper";

export { OutputEncoding, encodeDocument, type EncodeDocumentOptions } from "./encoding";
export { parseJson, stringifyJson } from "./json";

export { ConfigurationError, MapperError, RecordError } from "./errors";
