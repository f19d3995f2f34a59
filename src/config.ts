import { z } from "zod";

import { ConfigurationError, describeError } from "./errors";
import { createLogger } from "./logger";
import { createCaptureOperation, createReplaceOperation, type Operation } from "./operations";

const logger = createLogger("config");

/** Name of the host parameter carrying the operation list. */
export const SPEC_PARAM = "spec";

const captureSpecSchema = z
  .object({
    capture: z.object({
      regex: z.string(),
      target: z.string(),
      output: z.string(),
    }),
  })
  .strict();

const replaceSpecSchema = z
  .object({
    replace: z.object({
      regex: z.string(),
      target: z.string(),
      with: z.string(),
    }),
  })
  .strict();

export const operationSpecSchema = z.union([captureSpecSchema, replaceSpecSchema]);

export const operationListSchema = z.array(operationSpecSchema);

export type OperationSpec = z.infer<typeof operationSpecSchema>;

export type HostParams = ReadonlyMap<string, string> | Readonly<Record<string, string | undefined>>;

const isParamMap = (params: HostParams): params is ReadonlyMap<string, string> => params instanceof Map;

const formatIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => {
      const location = issue.path.length ? issue.path.join(".") : "(root)";
      return `${location}: ${issue.message}`;
    })
    .join("; ");

const buildOperation = (spec: OperationSpec): Operation => {
  if ("capture" in spec) {
    const { regex, target, output } = spec.capture;
    return createCaptureOperation(regex, target, output);
  }
  const { regex, target, with: template } = spec.replace;
  return createReplaceOperation(regex, target, template);
};

/**
 * Parses the JSON configuration blob into a frozen, ordered operation list.
 *
 * @throws {ConfigurationError} when the blob is missing, is not valid JSON, does not match
 * the operation schema, or holds a pattern that does not compile.
 */
export const parseOperations = (raw: string | undefined): readonly Operation[] => {
  if (raw === undefined) {
    throw new ConfigurationError("Operation list is missing");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse operation list: ${describeError(error)}`, { cause: error });
  }

  const result = operationListSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Invalid operation list: ${formatIssues(result.error)}`, { cause: result.error });
  }

  const operations = result.data.map((spec, index) => {
    try {
      return buildOperation(spec);
    } catch (error) {
      throw new ConfigurationError(`Operation ${index}: ${describeError(error)}`, { cause: error });
    }
  });

  return Object.freeze(operations);
};

/**
 * Reads the `spec` host parameter and parses it with {@link parseOperations}.
 */
export const loadOperations = (params: HostParams): readonly Operation[] => {
  const raw = isParamMap(params) ? params.get(SPEC_PARAM) : params[SPEC_PARAM];
  if (raw === undefined) {
    throw new ConfigurationError(`Missing required parameter '${SPEC_PARAM}'`);
  }
  const operations = parseOperations(raw);
  logger.info({ count: operations.length }, "loaded regex operations");
  return operations;
};
