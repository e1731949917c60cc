import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { getBuiltinRegistry } from "../expressions/functions.js";
import { parseTemplate } from "../template/loader.js";
import { analyzeReferences, detectCycle } from "./references.js";

const ubuntuVm = parseTemplate(JSON.parse(readFileSync(new URL("../../fixtures/ubuntu-vm.json", import.meta.url), "utf8")));

function analyze(raw: unknown) {
  return analyzeReferences(parseTemplate(raw), getBuiltinRegistry());
}

describe("analyzeReferences", () => {
  it("counts expressions and finds no unused declarations in the example template", () => {
    expect(analyzeReferences(ubuntuVm, getBuiltinRegistry())).toEqual({
      expressionCount: 17,
      unusedParameters: [],
      unusedVariables: [],
    });
  });

  it("reports unused parameters and variables by declared name", () => {
    const report = analyze({
      parameters: { Used: { type: "string" }, Spare: { type: "int", defaultValue: 1 } },
      variables: { Idle: "x" },
      resources: [],
      outputs: { o: "[parameters('used')]" },
    });
    expect(report.unusedParameters).toEqual(["Spare"]);
    expect(report.unusedVariables).toEqual(["Idle"]);
  });

  it("rejects unknown functions and wrong argument counts", () => {
    expect(() => analyze({ resources: [], outputs: { o: "[nope()]" } })).toThrow(
      "Invalid expression at outputs.o.value: Unknown function 'nope'",
    );
    expect(() => analyze({ resources: [], outputs: { o: "[concat()]" } })).toThrow(
      "'concat' expects at least 1 argument, got 0",
    );
  });

  it("reports syntax errors at their location", () => {
    expect(() => analyze({ variables: { v: "[concat('a']" }, resources: [] })).toThrow(/^Invalid expression at variables\.v: /);
  });

  it("checks branches that would not be evaluated", () => {
    expect(() =>
      analyze({ resources: [], outputs: { o: "[if(true(), 'a', variables('missing'))]" } }),
    ).toThrow('Unresolved variable reference "missing" in outputs.o.value');
  });

  it("rejects computed parameter names", () => {
    expect(() =>
      analyze({ parameters: { p: { type: "string" } }, resources: [], outputs: { o: "[parameters(concat('p'))]" } }),
    ).toThrow("Invalid expression at outputs.o.value: parameters() takes a literal name, not a computed one");
  });

  it("rejects copyIndex() outside resources", () => {
    expect(() => analyze({ resources: [], outputs: { o: "[copyIndex()]" } })).toThrow(
      "copyIndex() can only be used inside a resource with a copy loop",
    );
  });

  it("keeps user-defined functions self-contained", () => {
    const fn = (value: string) => ({
      resources: [],
      functions: [{ namespace: "ns", members: { f: { output: { type: "string", value } } } }],
      variables: { v: "x" },
    });
    expect(() => analyze(fn("[variables('v')]"))).toThrow(
      'variables() cannot be used in user-defined function "ns.f"',
    );
    expect(() => analyze(fn("[ns.f()]"))).toThrow("User-defined functions cannot call other user-defined functions ('ns.f')");
    expect(() => analyze(fn("[parameters('p')]"))).toThrow(
      'Unresolved parameter reference "p" in functions.ns.f.output.value',
    );
  });
});

describe("detectCycle", () => {
  const graph = (edges: Record<string, string[]>) =>
    new Map(Object.entries(edges).map(([node, deps]): [string, Set<string>] => [node, new Set(deps)]));

  it("returns the cycle as a closed path", () => {
    expect(detectCycle(graph({ a: ["b"], b: ["c"], c: ["a"] }))).toEqual(["a", "b", "c", "a"]);
    expect(detectCycle(graph({ a: ["a"] }))).toEqual(["a", "a"]);
  });

  it("returns null for acyclic graphs", () => {
    expect(detectCycle(graph({ a: ["b", "c"], b: ["c"], c: [] }))).toBeNull();
  });

  it("ignores edges to unknown nodes", () => {
    expect(detectCycle(graph({ a: ["z"] }))).toBeNull();
  });
});
