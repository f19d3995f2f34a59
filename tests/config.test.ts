import { describe, expect, it } from "vitest";

import { ConfigurationError, destinationOf, loadOperations, parseOperations } from "../src";

const blob = JSON.stringify([
  { capture: { regex: String.raw`(?i)second:\s+(\w+)\b`, target: "/description", output: "/parsed/second" } },
  { replace: { regex: String.raw`\d{3}-\d{2}-\d{4}`, target: "/name/ssn", with: "***-**-****" } },
]);

describe("parseOperations", () => {
  it("builds operations in configured order", () => {
    const operations = parseOperations(blob);
    expect(operations.map((operation) => operation.kind)).toEqual(["capture", "replace"]);
    expect(operations.map((operation) => operation.source)).toEqual(["/description", "/name/ssn"]);
    expect(operations.map(destinationOf)).toEqual(["/parsed/second", "/name/ssn"]);
    expect(operations[0].pattern.flags).toBe("iu");
    expect(operations[1].pattern.flags).toBe("gu");
  });

  it("freezes the operation list", () => {
    const operations = parseOperations(blob);
    expect(Object.isFrozen(operations)).toBe(true);
    expect(Object.isFrozen(operations[0])).toBe(true);
  });

  it("accepts an empty list", () => {
    expect(parseOperations("[]")).toEqual([]);
  });

  it("ignores unknown fields inside an operation", () => {
    const operations = parseOperations(
      JSON.stringify([{ capture: { regex: "(a)", target: "/x", output: "/y", note: "extra" } }]),
    );
    expect(operations).toHaveLength(1);
  });

  it("rejects a missing blob", () => {
    expect(() => parseOperations(undefined)).toThrow(ConfigurationError);
    expect(() => parseOperations(undefined)).toThrow("Operation list is missing");
  });

  it("rejects malformed JSON", () => {
    expect(() => parseOperations("[{")).toThrow(/^Cannot parse operation list: /);
  });

  it("rejects entries that match neither operation shape", () => {
    expect(() => parseOperations(JSON.stringify([{ capture: { regex: "(a)", target: "/x" } }]))).toThrow(
      /^Invalid operation list: /,
    );
    expect(() => parseOperations(JSON.stringify({ capture: {} }))).toThrow(ConfigurationError);
    expect(() =>
      parseOperations(
        JSON.stringify([
          {
            capture: { regex: "(a)", target: "/x", output: "/y" },
            replace: { regex: "a", target: "/x", with: "b" },
          },
        ]),
      ),
    ).toThrow(ConfigurationError);
  });

  it("rejects patterns that do not compile and names the operation", () => {
    const invalid = JSON.stringify([
      { replace: { regex: "a", target: "/x", with: "b" } },
      { capture: { regex: "(unclosed", target: "/x", output: "/y" } },
    ]);
    expect(() => parseOperations(invalid)).toThrow(/^Operation 1: Invalid capture regex '\(unclosed'/);
  });

  it("rejects unsupported inline flags", () => {
    const invalid = JSON.stringify([{ replace: { regex: "(?x)a", target: "/x", with: "b" } }]);
    expect(() => parseOperations(invalid)).toThrow(/^Operation 0: Invalid replace regex/);
  });
});

describe("loadOperations", () => {
  it("reads the spec parameter from a map", () => {
    const operations = loadOperations(new Map([["spec", blob]]));
    expect(operations).toHaveLength(2);
  });

  it("reads the spec parameter from a plain record", () => {
    expect(loadOperations({ spec: blob })).toHaveLength(2);
  });

  it("fails when the parameter is missing", () => {
    expect(() => loadOperations(new Map())).toThrow("Missing required parameter 'spec'");
    expect(() => loadOperations({ other: blob })).toThrow(ConfigurationError);
  });
});
