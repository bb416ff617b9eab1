/**
 * Fixed renderings of Python operators, spacing included.
 */

import type { BoolOperator, ComparisonOperator, Operator, UnaryOperator } from "../python-ast";

export function operatorText(op: Operator): string {
  switch (op) {
    case "add":
      return " + ";
    case "sub":
      return " - ";
    case "mult":
      return " * ";
    case "div":
      return " / ";
    case "floorDiv":
      return " // ";
    case "mod":
      return " % ";
    case "pow":
      return " ** ";
    case "lShift":
      return " << ";
    case "rShift":
      return " >> ";
    case "bitOr":
      return " | ";
    case "bitXor":
      return " ^ ";
    case "bitAnd":
      return " & ";
    case "matMult":
      return " @ ";
    default: {
      const _exhaustive: never = op;
      throw new Error(`Unknown operator: ${op}`);
    }
  }
}

export function boolOperatorText(op: BoolOperator): string {
  switch (op) {
    case "and":
      return " and ";
    case "or":
      return " or ";
    default: {
      const _exhaustive: never = op;
      throw new Error(`Unknown boolean operator: ${op}`);
    }
  }
}

export function comparisonOperatorText(op: ComparisonOperator): string {
  switch (op) {
    case "eq":
      return " == ";
    case "notEq":
      return " != ";
    case "lt":
      return " < ";
    case "ltE":
      return " <= ";
    case "gt":
      return " > ";
    case "gtE":
      return " >= ";
    case "is":
      return " is ";
    case "isNot":
      return " is not ";
    case "in":
      return " in ";
    case "notIn":
      return " not in ";
    default: {
      const _exhaustive: never = op;
      throw new Error(`Unknown comparison operator: ${op}`);
    }
  }
}

// Unary operators carry no trailing space except `not`
export function unaryOperatorText(op: UnaryOperator): string {
  switch (op) {
    case "invert":
      return "~";
    case "not":
      return "not ";
    case "uAdd":
      return "+";
    case "uSub":
      return "-";
    default: {
      const _exhaustive: never = op;
      throw new Error(`Unknown unary operator: ${op}`);
    }
  }
}
