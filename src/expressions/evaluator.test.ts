import { describe, it, expect } from "vitest";
import { DEFAULT_DEPLOYMENT_SCOPE } from "../config.js";
import { InvalidExpressionError } from "../errors.js";
import type { UserFunction } from "../template/types.js";
import type { JsonValue } from "../types.js";
import { childPath, ExpressionEvaluator, type EvaluationContext } from "./evaluator.js";
import { getBuiltinRegistry } from "./functions.js";
import { parseExpression } from "./parser.js";
import { FunctionEvaluationError } from "./registry.js";
import { serializeExpression } from "./serializer.js";
import { isResidual, type EvalResult } from "./types.js";

const greet: UserFunction = {
  namespace: "contoso",
  name: "greet",
  qualifiedName: "contoso.greet",
  parameters: [{ name: "name", type: "string" }],
  output: { type: "string", value: "[concat('Hello, ', parameters('name'))]" },
};

const leaky: UserFunction = {
  namespace: "contoso",
  name: "leaky",
  qualifiedName: "contoso.leaky",
  parameters: [],
  output: { type: "string", value: "[parameters('p')]" },
};

function evaluator(parameters: Record<string, JsonValue> = {}, allowDeferred = true): ExpressionEvaluator {
  const functions = new Map([greet, leaky].map((fn): [string, UserFunction] => [fn.qualifiedName, fn]));
  const context: EvaluationContext = {
    scope: DEFAULT_DEPLOYMENT_SCOPE,
    allowDeferred,
    parameter: (name) => {
      const value = parameters[name];
      if (value === undefined) throw new FunctionEvaluationError(`no parameter ${name}`);
      return value;
    },
    variable: (name) => {
      throw new FunctionEvaluationError(`no variable ${name}`);
    },
    copyIndex: () => 0,
    userFunction: (qualifiedName) => functions.get(qualifiedName),
  };
  return new ExpressionEvaluator(getBuiltinRegistry(), context);
}

function serialized(result: EvalResult): string {
  if (!isResidual(result)) throw new Error(`expected a residual, got ${JSON.stringify(result)}`);
  return serializeExpression(result.expression);
}

describe("ExpressionEvaluator", () => {
  describe("accessors", () => {
    it("reads properties case-insensitively", () => {
      expect(evaluator().evaluate(parseExpression("createObject('Name', 'x').name"))).toBe("x");
    });

    it("lists the available properties when one is missing", () => {
      expect(() => evaluator().evaluate(parseExpression("createObject('a', 1).nope"))).toThrow(
        "Property 'nope' does not exist; available properties are 'a'",
      );
    });

    it("indexes arrays and objects", () => {
      expect(evaluator().evaluate(parseExpression("createArray(1, 2)[1]"))).toBe(2);
      expect(evaluator().evaluate(parseExpression("createObject('k', 'v')['K']"))).toBe("v");
      expect(() => evaluator().evaluate(parseExpression("createArray(1)[5]"))).toThrow(
        "Index 5 is out of range for an array of length 1",
      );
    });
  });

  describe("deployment-time functions", () => {
    it("leaves reference() in place with its accessors", () => {
      const result = evaluator().evaluate(parseExpression("reference('nic1').properties.ip"));
      expect(serialized(result)).toBe("reference('nic1').properties.ip");
    });

    it("folds resolvable arguments around a residual", () => {
      const result = evaluator({ p: "a" }).evaluate(parseExpression("concat(parameters('p'), reference('x').id)"));
      expect(serialized(result)).toBe("concat('a', reference('x').id)");
    });

    it("folds both branches of an if() whose condition is deferred", () => {
      const result = evaluator({ p: "a" }).evaluate(
        parseExpression("if(equals(reference('x').state, 'ok'), parameters('p'), 'b')"),
      );
      expect(serialized(result)).toBe("if(equals(reference('x').state, 'ok'), 'a', 'b')");
    });

    it("rejects deployment-time functions where they are not allowed", () => {
      expect(() => evaluator({}, false).evaluate(parseExpression("reference('x')"))).toThrow(
        "'reference' is only available at deployment time and cannot be used here",
      );
    });
  });

  describe("resolve", () => {
    it("resolves nested values and reports deferred paths", () => {
      const result = evaluator().resolve(
        { a: "[concat('x', 'y')]", b: ["[[literal]", 3], "c-d": "[reference('n').id]" },
        "root",
      );
      expect(result.value).toEqual({ a: "xy", b: ["[literal]", 3], "c-d": "[reference('n').id]" });
      expect(result.deferred).toEqual(['root["c-d"]']);
    });

    it("reports failures as InvalidExpression at the failing path", () => {
      try {
        evaluator().resolve({ x: ["ok", "[concat(]"] }, "variables");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidExpressionError);
        if (error instanceof InvalidExpressionError) {
          expect(error.code).toBe("InvalidExpression");
          expect(error.target).toBe("variables.x[1]");
          expect(error.details).toEqual(["[concat(]"]);
        }
      }
    });
  });

  describe("user-defined functions", () => {
    it("evaluates the body with the call's arguments", () => {
      expect(evaluator().evaluate(parseExpression("contoso.greet('Ada')"))).toBe("Hello, Ada");
      expect(evaluator().evaluate(parseExpression("Contoso.Greet('Ada')"))).toBe("Hello, Ada");
    });

    it("checks argument count and types", () => {
      expect(() => evaluator().evaluate(parseExpression("contoso.greet()"))).toThrow(
        "'contoso.greet' expects 1 argument, got 0",
      );
      expect(() => evaluator().evaluate(parseExpression("contoso.greet(1)"))).toThrow(
        "'contoso.greet' parameter 'name' must be of type string, got int",
      );
    });

    it("does not expose template parameters to the body", () => {
      expect(() => evaluator({ p: "outer" }).evaluate(parseExpression("contoso.leaky()"))).toThrow(
        "'contoso.leaky' has no parameter named 'p'",
      );
    });

    it("rejects unknown user-defined functions", () => {
      expect(() => evaluator().evaluate(parseExpression("contoso.missing()"))).toThrow(
        "Unknown user-defined function 'contoso.missing'",
      );
    });
  });
});

describe("childPath", () => {
  it("uses dot notation for identifiers and brackets otherwise", () => {
    expect(childPath("outputs", "privateIp")).toBe("outputs.privateIp");
    expect(childPath("resources", "box1-nic")).toBe('resources["box1-nic"]');
  });
});
