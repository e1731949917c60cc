import { describe, it, expect } from "vitest";
import { ExpressionLexer, ExpressionSyntaxError } from "./lexer.js";
import { isExpressionString, parseExpression, parseTemplateExpression, unescapeLiteral } from "./parser.js";
import { literalExpression, serializeExpression, toTemplateString } from "./serializer.js";

describe("ExpressionLexer", () => {
  it("tokenizes calls, strings and integers", () => {
    const tokens = new ExpressionLexer("concat('a''b', -12)").tokenize();
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      ["IDENTIFIER", "concat"],
      ["LPAREN", "("],
      ["STRING", "a'b"],
      ["COMMA", ","],
      ["NUMBER", "-12"],
      ["RPAREN", ")"],
      ["EOF", ""],
    ]);
  });

  it("rejects decimal literals", () => {
    expect(() => new ExpressionLexer("add(1.5, 2)").tokenize()).toThrow("Only integer literals are supported");
  });

  it("rejects unterminated strings", () => {
    expect(() => new ExpressionLexer("concat('abc").tokenize()).toThrow("Unterminated string literal");
  });

  it("reports the position of an unexpected character", () => {
    try {
      new ExpressionLexer("concat(#)").tokenize();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ExpressionSyntaxError);
      if (error instanceof ExpressionSyntaxError) {
        expect(error.position).toBe(7);
        expect(error.message).toContain("Unexpected character '#'");
      }
    }
  });
});

describe("ExpressionParser", () => {
  it("parses nested calls", () => {
    expect(parseExpression("concat(parameters('vmname'), '-nic')")).toEqual({
      kind: "call",
      name: "concat",
      position: 0,
      args: [
        { kind: "call", name: "parameters", position: 7, args: [{ kind: "string", value: "vmname" }] },
        { kind: "string", value: "-nic" },
      ],
    });
  });

  it("parses property and index accessors", () => {
    const expr = parseExpression("reference('nic').ipConfigurations[0].name");
    expect(expr.kind).toBe("property");
    expect(serializeExpression(expr)).toBe("reference('nic').ipConfigurations[0].name");
  });

  it("parses namespaced user function calls", () => {
    const expr = parseExpression("contoso.uniqueName('web')");
    expect(expr).toEqual({
      kind: "call",
      namespace: "contoso",
      name: "uniqueName",
      position: 0,
      args: [{ kind: "string", value: "web" }],
    });
  });

  it("rejects an empty expression", () => {
    expect(() => parseExpression("")).toThrow("Empty expression");
  });

  it("rejects a bare identifier", () => {
    expect(() => parseExpression("foo")).toThrow("Expected '(' after function name 'foo'");
  });

  it("rejects a truncated call", () => {
    expect(() => parseExpression("concat(")).toThrow("Unexpected end of expression");
  });

  it("rejects trailing tokens", () => {
    expect(() => parseExpression("true() false()")).toThrow("Expected end of expression, got 'false'");
  });
});

describe("template string helpers", () => {
  it("recognises expression strings", () => {
    expect(isExpressionString("[variables('a')]")).toBe(true);
    expect(isExpressionString("[[variables('a')]")).toBe(false);
    expect(isExpressionString("plain")).toBe(false);
    expect(isExpressionString("[unclosed")).toBe(false);
  });

  it("unescapes double-bracket literals", () => {
    expect(unescapeLiteral("[[not an expression]")).toBe("[not an expression]");
    expect(unescapeLiteral("plain")).toBe("plain");
  });

  it("parses the body of a bracketed string", () => {
    expect(parseTemplateExpression("[true()]")).toEqual({ kind: "call", name: "true", args: [], position: 0 });
    expect(() => parseTemplateExpression("true()")).toThrow("Template expressions must be enclosed in '[' and ']'");
  });
});

describe("serializer", () => {
  it("serializes a parsed expression back to equivalent text", () => {
    const text = "concat(parameters('a'), 'it''s', ns.fn(-3))";
    expect(serializeExpression(parseExpression(text))).toBe(text);
  });

  it("builds literal expressions for JSON values", () => {
    expect(serializeExpression(literalExpression({ a: [1, true] }))).toBe("createObject('a', createArray(1, true()))");
    expect(serializeExpression(literalExpression(null))).toBe("null()");
    expect(serializeExpression(literalExpression(1.5))).toBe("json('1.5')");
  });

  it("wraps expressions in brackets for template strings", () => {
    expect(toTemplateString(parseExpression("variables('x')"))).toBe("[variables('x')]");
  });
});
