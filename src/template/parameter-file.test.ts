import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import { InvalidParameterValueError, MalformedDocumentError } from "../errors.js";
import type { ParameterDeclaration } from "./types.js";
import {
  coerceParameterValue,
  loadParameterFile,
  parseAssignment,
  parseParameterFile,
  parseParameterFileJson,
} from "./parameter-file.js";

const fixture = fileURLToPath(new URL("../../fixtures/ubuntu-vm.parameters.json", import.meta.url));

describe("parseParameterFile", () => {
  it("reads each entry's value", () => {
    expect(parseParameterFile({ parameters: { a: { value: 1 }, b: { value: { c: [true] } } } })).toEqual({
      a: 1,
      b: { c: [true] },
    });
  });

  it("rejects secret store references", () => {
    expect(() => parseParameterFile({ parameters: { pw: { reference: { keyVault: { id: "kv" } } } } })).toThrow(
      'parameter file: parameter "pw" uses a secret store reference, which cannot be resolved offline',
    );
  });

  it("rejects entries without a value", () => {
    expect(() => parseParameterFile({ parameters: { a: {} } }, "params.json")).toThrow(
      'params.json: parameter "a" has no value',
    );
  });

  it("rejects documents without parameters", () => {
    expect(() => parseParameterFile({ values: {} })).toThrow(MalformedDocumentError);
  });

  it("rejects invalid JSON text", () => {
    expect(() => parseParameterFileJson("not json")).toThrow(/^parameter file is not valid JSON: /);
  });

  it("loads a parameter file from disk", async () => {
    expect(await loadParameterFile(fixture)).toEqual({ vmname: "box1", adminPassword: "test-secret" });
  });
});

describe("parseAssignment", () => {
  it("splits at the first equals sign", () => {
    expect(parseAssignment("tags={\"a\":\"b=c\"}")).toEqual({ name: "tags", value: '{"a":"b=c"}' });
    expect(parseAssignment("empty=")).toEqual({ name: "empty", value: "" });
  });

  it("rejects text without a name", () => {
    expect(() => parseAssignment("=x")).toThrow(InvalidParameterValueError);
    expect(() => parseAssignment("novalue")).toThrow(
      'Invalid value for parameter "novalue": expected an assignment of the form name=value',
    );
  });
});

describe("coerceParameterValue", () => {
  const decl = (type: ParameterDeclaration["type"]): ParameterDeclaration => ({ name: "p", type });

  it("keeps strings and undeclared parameters as text", () => {
    expect(coerceParameterValue(decl("string"), "p", "42")).toBe("42");
    expect(coerceParameterValue(undefined, "other", "42")).toBe("42");
  });

  it("parses ints", () => {
    expect(coerceParameterValue(decl("int"), "count", "-3")).toBe(-3);
    expect(() => coerceParameterValue(decl("int"), "count", "4x")).toThrow(
      'Invalid value for parameter "count": "4x" is not an int',
    );
  });

  it("parses bools case-insensitively", () => {
    expect(coerceParameterValue(decl("bool"), "flag", "TRUE")).toBe(true);
    expect(() => coerceParameterValue(decl("bool"), "flag", "yes")).toThrow(
      'Invalid value for parameter "flag": "yes" is not a bool (expected true or false)',
    );
  });

  it("parses JSON for objects and arrays", () => {
    expect(coerceParameterValue(decl("array"), "list", "[1,2]")).toEqual([1, 2]);
    expect(coerceParameterValue(decl("object"), "tags", '{"env":"dev"}')).toEqual({ env: "dev" });
    expect(() => coerceParameterValue(decl("object"), "tags", "[1]")).toThrow(
      'Invalid value for parameter "tags": expected JSON for a parameter of type object',
    );
  });
});
