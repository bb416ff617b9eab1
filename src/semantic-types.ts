/**
 * Semantic types of the source program, as the front end reports them.
 *
 * The builder (see builder/) dispatches on these to decide how a literal or a
 * runtime type test is expressed in Python.
 */

import type { NumberKind } from "./python-ast";

export type ExtendedNumberKind = "int64" | "uint64" | "decimal" | "bigint";

export type SemanticType =
  | { kind: "any" }
  | { kind: "unit" }
  | { kind: "boolean" }
  | { kind: "char" }
  | { kind: "string" }
  | { kind: "regex" }
  | { kind: "number"; numberKind: NumberKind }
  | { kind: "extendedNumber"; numberKind: ExtendedNumberKind }
  | { kind: "enum"; name: string; numberKind: NumberKind }
  | { kind: "function"; args: SemanticType[]; returns: SemanticType }
  | { kind: "array"; element: SemanticType }
  | { kind: "tuple"; elements: SemanticType[] }
  | { kind: "list"; element: SemanticType }
  | { kind: "option"; inner: SemanticType }
  | { kind: "genericParam"; name: string }
  | { kind: "erasedUnion"; alternatives: SemanticType[] }
  | { kind: "declared"; entity: string; genericArgs: SemanticType[] };

/** Raw byte/short buffers arrive in place of array literals for small element types */
export type SmallIntArray = Uint8Array | Int8Array | Uint16Array | Int16Array;

/** Runtime value of a literal, before it is turned into an expression */
export type LiteralValue = boolean | string | number | bigint | null | undefined | SmallIntArray;

// ============================================================================
// Constructors
// ============================================================================

export const anyType: SemanticType = { kind: "any" };
export const unitType: SemanticType = { kind: "unit" };
export const booleanType: SemanticType = { kind: "boolean" };
export const charType: SemanticType = { kind: "char" };
export const stringType: SemanticType = { kind: "string" };
export const regexType: SemanticType = { kind: "regex" };

export const numberType = (numberKind: NumberKind): SemanticType => ({ kind: "number", numberKind });

export const extendedNumberType = (numberKind: ExtendedNumberKind): SemanticType => ({
  kind: "extendedNumber",
  numberKind,
});

export const enumType = (name: string, numberKind: NumberKind = "int32"): SemanticType => ({
  kind: "enum",
  name,
  numberKind,
});

export const arrayType = (element: SemanticType): SemanticType => ({ kind: "array", element });

export const listType = (element: SemanticType): SemanticType => ({ kind: "list", element });

export const tupleType = (elements: SemanticType[]): SemanticType => ({ kind: "tuple", elements });

export const optionType = (inner: SemanticType): SemanticType => ({ kind: "option", inner });

export const functionType = (args: SemanticType[], returns: SemanticType): SemanticType => ({
  kind: "function",
  args,
  returns,
});

export const declaredType = (entity: string, genericArgs: SemanticType[] = []): SemanticType => ({
  kind: "declared",
  entity,
  genericArgs,
});

// ============================================================================
// Formatting
// ============================================================================

/**
 * Render a type for diagnostics.
 */
export function formatType(type: SemanticType): string {
  switch (type.kind) {
    case "any":
    case "unit":
    case "boolean":
    case "char":
    case "string":
    case "regex":
      return type.kind;
    case "number":
    case "extendedNumber":
      return type.numberKind;
    case "enum":
      return `enum ${type.name}`;
    case "function":
      return `(${type.args.map(formatType).join(", ")}) -> ${formatType(type.returns)}`;
    case "array":
      return `${formatType(type.element)}[]`;
    case "list":
      return `list<${formatType(type.element)}>`;
    case "tuple":
      return `(${type.elements.map(formatType).join(" * ")})`;
    case "option":
      return `${formatType(type.inner)} option`;
    case "genericParam":
      return `'${type.name}`;
    case "erasedUnion":
      return type.alternatives.map(formatType).join(" | ");
    case "declared":
      return type.genericArgs.length > 0
        ? `${type.entity}<${type.genericArgs.map(formatType).join(", ")}>`
        : type.entity;
  }
}
