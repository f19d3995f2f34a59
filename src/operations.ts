import { ConfigurationError, describeError } from "./errors";
import { captureFirstGroup, compilePattern, replaceAllMatches } from "./regex";

export type OperationKind = "capture" | "replace";

interface OperationBase {
  /** Pattern as configured. */
  readonly regex: string;
  readonly pattern: RegExp;
  /** JSON Pointer (or `$` JSONPath selector) of the field the pattern runs against. */
  readonly source: string;
}

export interface CaptureOperation extends OperationBase {
  readonly kind: "capture";
  /** JSON Pointer receiving group 1 of the first match. */
  readonly output: string;
}

export interface ReplaceOperation extends OperationBase {
  readonly kind: "replace";
  /** Replacement template; the result is written back to `source`. */
  readonly with: string;
}

export type Operation = CaptureOperation | ReplaceOperation;

const compileOrThrow = (kind: OperationKind, regex: string, flags: string) => {
  try {
    return compilePattern(regex, flags);
  } catch (error) {
    throw new ConfigurationError(`Invalid ${kind} regex '${regex}': ${describeError(error)}`, { cause: error });
  }
};

/**
 * Creates an operation that extracts the first capture group of `regex` from `source` into `output`.
 */
export const createCaptureOperation = (regex: string, source: string, output: string): CaptureOperation => {
  const operation: CaptureOperation = {
    kind: "capture",
    regex,
    pattern: compileOrThrow("capture", regex, ""),
    source,
    output,
  };
  return Object.freeze(operation);
};

/**
 * Creates an operation that rewrites `source` in place, replacing every match of `regex` with `template`.
 */
export const createReplaceOperation = (regex: string, source: string, template: string): ReplaceOperation => {
  const operation: ReplaceOperation = {
    kind: "replace",
    regex,
    pattern: compileOrThrow("replace", regex, "g"),
    source,
    with: template,
  };
  return Object.freeze(operation);
};

export const destinationOf = (operation: Operation): string => {
  switch (operation.kind) {
    case "capture":
      return operation.output;
    case "replace":
      return operation.source;
  }
};

/**
 * Runs the operation against `text`. An empty result means there is nothing to write.
 */
export const applyOperation = (operation: Operation, text: string): string => {
  switch (operation.kind) {
    case "capture":
      return captureFirstGroup(text, operation.pattern);
    case "replace":
      return replaceAllMatches(text, operation.pattern, operation.with);
  }
};
