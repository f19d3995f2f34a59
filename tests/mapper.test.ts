import { describe, expect, it } from "vitest";

import {
  ConfigurationError,
  OutputEncoding,
  RecordError,
  createRecordMapper,
  encodeDocument,
} from "../src";

const params = new Map([
  [
    "spec",
    JSON.stringify([
      { capture: { regex: String.raw`(?i)ref:\s*([A-Z]+-\d+)`, target: "/note", output: "/parsed/ref" } },
    ]),
  ],
]);

const encoder = new TextEncoder();

describe("createRecordMapper", () => {
  it("transforms the value and passes the key through", () => {
    const mapper = createRecordMapper(params);
    const output = mapper.map({ key: "k-1", value: encoder.encode('{"id":7,"note":"Ref: AB-12"}') });
    expect(output).toEqual({ key: "k-1", value: '{"id":7,"note":"Ref: AB-12","parsed":{"ref":"AB-12"}}' });
  });

  it("passes a missing key through", () => {
    const mapper = createRecordMapper(params);
    expect(mapper.map({ key: null, value: '{"note":"none"}' })).toEqual({ key: null, value: '{"note":"none"}' });
  });

  it("reuses the same frozen operations for every record", () => {
    const mapper = createRecordMapper(params);
    const before = mapper.operations;
    mapper.map({ key: undefined, value: '{"note":"ref: XY-1"}' });
    mapper.map({ key: undefined, value: '{"note":"ref: XY-2"}' });
    expect(mapper.operations).toBe(before);
    expect(Object.isFrozen(mapper.operations)).toBe(true);
  });

  it("emits pretty JSON when requested", () => {
    const mapper = createRecordMapper(params, { encoding: OutputEncoding.JsonPretty });
    const output = mapper.map({ key: "k", value: '{"note":"ref: XY-1"}' });
    expect(output.value).toBe(JSON.stringify({ note: "ref: XY-1", parsed: { ref: "XY-1" } }, null, 2));
  });

  it("keeps integers beyond 2^53 exact in untouched fields", () => {
    const mapper = createRecordMapper(params);
    const output = mapper.map({ key: "k", value: '{"id":12345678901234567890,"note":"ref: XY-1"}' });
    expect(output.value).toBe('{"id":12345678901234567890,"note":"ref: XY-1","parsed":{"ref":"XY-1"}}');
  });

  it("fails a record that is not JSON", () => {
    const mapper = createRecordMapper(params);
    expect(() => mapper.map({ key: "k", value: "not json" })).toThrow(RecordError);
  });

  it("refuses to start without a valid spec parameter", () => {
    expect(() => createRecordMapper(new Map())).toThrow(ConfigurationError);
    expect(() => createRecordMapper({ spec: '[{"capture":{"regex":"(","target":"/a","output":"/b"}}]' })).toThrow(
      ConfigurationError,
    );
  });
});

describe("encodeDocument", () => {
  const document = { a: 1, list: ["x", "y"] };

  it("defaults to compact JSON", () => {
    expect(encodeDocument(document)).toBe('{"a":1,"list":["x","y"]}');
  });

  it("honours the JSON indent", () => {
    expect(encodeDocument(document, { encoding: OutputEncoding.JsonPretty, jsonIndent: 4 })).toBe(
      JSON.stringify(document, null, 4),
    );
  });
});
