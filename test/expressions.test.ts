/**
 * Tests for expression printing.
 */

import { describe, it, expect } from "vitest";
import {
  expressionToString,
  DiagnosticCollector,
  CompileError,
  name,
  int,
  num,
  str,
  bool,
  none,
  call,
  keyword,
  attribute,
  subscript,
  binOp,
  unaryOp,
  boolOp,
  compare,
  ifExp,
  lambda,
  args,
  arg,
  tuple,
  list,
  set,
  dict,
  namedExpr,
  starred,
  typedLiteral,
  extendedNumberType,
  span,
  type Expression,
} from "../src/index";

const a = name("a");
const b = name("b");
const c = name("c");
const x = name("x");

describe("Expression printing", () => {
  describe("operators", () => {
    it("parenthesizes compound operands", () => {
      expect(expressionToString(binOp(a, "add", binOp(b, "mult", c)))).toBe("a + (b * c)");
      expect(expressionToString(binOp(binOp(a, "add", b), "mult", c))).toBe("(a + b) * c");
    });

    it("prints every binary operator with surrounding spaces", () => {
      expect(expressionToString(binOp(a, "floorDiv", b))).toBe("a // b");
      expect(expressionToString(binOp(a, "pow", int(2)))).toBe("a ** 2");
      expect(expressionToString(binOp(a, "matMult", b))).toBe("a @ b");
      expect(expressionToString(binOp(a, "rShift", int(1)))).toBe("a >> 1");
    });

    it("keeps names and constants bare", () => {
      expect(expressionToString(binOp(str("s"), "mod", x))).toBe('"s" % x');
    });

    it("parenthesizes calls and attributes used as operands", () => {
      expect(expressionToString(binOp(call(name("f")), "sub", attribute(a, "n")))).toBe("(f()) - (a.n)");
    });

    it("parenthesizes negative numeric operands", () => {
      expect(expressionToString(binOp(num(-1, "int32"), "pow", int(2)))).toBe("(-1) ** 2");
      expect(expressionToString(unaryOp("uSub", num(-1, "int32")))).toBe("-(-1)");
    });

    it("prints unary operators", () => {
      expect(expressionToString(unaryOp("not", x))).toBe("not x");
      expect(expressionToString(unaryOp("invert", x))).toBe("~x");
      expect(expressionToString(unaryOp("uSub", int(1)))).toBe("-1");
      expect(expressionToString(unaryOp("uAdd", binOp(a, "add", b)))).toBe("+(a + b)");
    });

    it("prints boolean chains", () => {
      expect(expressionToString(boolOp("and", [a, b, compare(c, ["lt"], [int(0)])]))).toBe("a and b and (c < 0)");
      expect(expressionToString(boolOp("or", [a, b]))).toBe("a or b");
    });

    it("prints comparison chains", () => {
      expect(expressionToString(compare(a, ["lt", "ltE"], [b, c]))).toBe("a < b <= c");
      expect(expressionToString(compare(x, ["isNot"], [none()]))).toBe("x is not None");
      expect(expressionToString(compare(x, ["notIn"], [list([a])]))).toBe("x not in ([a])");
    });

    it("pairs comparison operators with comparators up to the shorter list", () => {
      expect(expressionToString(compare(a, ["eq", "notEq"], [b]))).toBe("a == b");
    });
  });

  describe("calls and accessors", () => {
    it("prints positional arguments then keywords", () => {
      const expr = call(name("f"), [a, int(1)], [keyword("sep", str(", "))]);
      expect(expressionToString(expr)).toBe('f(a, 1, sep=", ")');
    });

    it("prints keyword-only calls", () => {
      expect(expressionToString(call(name("f"), [], [keyword("flag", bool(true))]))).toBe("f(flag=True)");
    });

    it("parenthesizes callees that are not primary", () => {
      const fn = lambda(args([arg("v")]), name("v"));
      expect(expressionToString(call(fn, [int(1)]))).toBe("(lambda v: v)(1)");
    });

    it("chains attributes, subscripts and calls", () => {
      const expr = call(attribute(subscript(name("xs"), int(0)), "strip"));
      expect(expressionToString(expr)).toBe("xs[0].strip()");
    });

    it("parenthesizes numbers before an attribute", () => {
      expect(expressionToString(attribute(int(1), "real"))).toBe("(1).real");
      expect(expressionToString(attribute(str("-"), "join"))).toBe('"-".join');
    });
  });

  describe("compound expressions", () => {
    it("prints conditional expressions with parenthesized test and else branch", () => {
      expect(expressionToString(ifExp(c, a, b))).toBe("a if (c) else (b)");
    });

    it("parenthesizes a nested conditional in the body position", () => {
      expect(expressionToString(ifExp(c, ifExp(x, a, b), int(0)))).toBe("(a if (x) else (b)) if (c) else (0)");
    });

    it("prints lambdas", () => {
      expect(expressionToString(lambda(args(), none()))).toBe("lambda: None");
      expect(expressionToString(lambda(args([arg("p"), arg("q")]), binOp(name("p"), "add", name("q"))))).toBe(
        "lambda p, q: p + q"
      );
    });

    it("drops annotations in lambda parameters", () => {
      expect(expressionToString(lambda(args([arg("p", name("int"))]), name("p")))).toBe("lambda p: p");
    });

    it("prints tuples", () => {
      expect(expressionToString(tuple([]))).toBe("()");
      expect(expressionToString(tuple([int(1)]))).toBe("(1,)");
      expect(expressionToString(tuple([a, b]))).toBe("(a, b)");
    });

    it("prints lists and sets", () => {
      expect(expressionToString(list([int(1), int(2)]))).toBe("[1, 2]");
      expect(expressionToString(list([]))).toBe("[]");
      expect(expressionToString(set([a]))).toBe("{a}");
      expect(expressionToString(set([]))).toBe("set()");
    });

    it("prints dictionaries one entry per line", () => {
      const expr = dict([
        [str("a"), int(1)],
        [str("b"), int(2)],
      ]);
      expect(expressionToString(expr)).toBe('{\n    "a": 1,\n    "b": 2\n}');
      expect(expressionToString(dict([]))).toBe("{}");
    });

    it("prints named expressions and starred values", () => {
      expect(expressionToString(namedExpr(x, int(1)))).toBe("(x := 1)");
      expect(expressionToString(starred(name("xs")))).toBe("*xs");
      expect(expressionToString(starred(binOp(a, "add", b)))).toBe("*(a + b)");
    });
  });

  describe("typed literals", () => {
    it("expands through the builder", () => {
      expect(expressionToString(typedLiteral(extendedNumberType("int64"), 42n))).toBe(
        "Long.from_bits(42.0, 0.0, False)"
      );
    });

    it("parenthesizes an expanded literal used as an operand", () => {
      const expr = binOp(typedLiteral(extendedNumberType("int64"), 1n), "add", x);
      expect(expressionToString(expr)).toBe("(Long.from_bits(1.0, 0.0, False)) + x");
    });
  });

  describe("unsupported expressions", () => {
    const yieldExpr: Expression = { kind: "yield", value: x, loc: span(4, 2) };

    it("throw under the fatal policy", () => {
      expect(() => expressionToString(yieldExpr)).toThrow(CompileError);
      expect(() => expressionToString(yieldExpr)).toThrow("yield is not supported yet");
    });

    it("print None and report under the recover policy", () => {
      const diagnostics = new DiagnosticCollector();
      const code = expressionToString(yieldExpr, { failurePolicy: "recover", diagnostics });
      expect(code).toBe("None");
      expect(diagnostics.getErrors()).toEqual([
        {
          severity: "error",
          code: "PY003",
          message: "yield is not supported yet",
          loc: span(4, 2),
          fileName: undefined,
        },
      ]);
    });

    it("report formatted values by name", () => {
      const diagnostics = new DiagnosticCollector();
      const expr: Expression = { kind: "formattedValue", value: x };
      expressionToString(expr, { failurePolicy: "recover", diagnostics });
      expect(diagnostics.getErrors().map((d) => d.message)).toEqual(["Formatted value is not supported yet"]);
    });
  });
});
