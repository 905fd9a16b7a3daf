export type PrimitiveType = "int" | "boolean" | "char" | "short" | "byte";

export const PRIMITIVE_TYPES: readonly PrimitiveType[] = ["int", "boolean", "char", "short", "byte"];

export interface ArrayType {
  kind: "array";
  type: JvmType;
}

export interface ClassType {
  kind: "class";
  name: string;
}

export type JvmType = PrimitiveType | ArrayType | ClassType;

export interface IntValue {
  kind: "int";
  value: number;
}

export interface BooleanValue {
  kind: "boolean";
  value: boolean;
}

/**
 * A UTF-16 code unit, kept numeric so it takes part in comparisons and
 * arithmetic the way the JVM treats chars.
 */
export interface CharValue {
  kind: "char";
  value: number;
}

export interface ShortValue {
  kind: "short";
  value: number;
}

export interface ByteValue {
  kind: "byte";
  value: number;
}

/**
 * A heap key, or `null` for the null reference.
 */
export interface ReferenceValue {
  kind: "reference";
  ref: number | null;
}

export interface ArrayValue {
  kind: "array";
  elementType: JvmType;
  elements: readonly StackValue[];
}

export interface ObjectValue {
  kind: "object";
  className: string;
  fields: Map<string, StackValue>;
}

/** Values that live in local slots, on operand stacks and inside heap entries. */
export type StackValue =
  | IntValue
  | BooleanValue
  | CharValue
  | ShortValue
  | ByteValue
  | ReferenceValue;

/** Values that only ever live in the heap, addressed through a reference. */
export type HeapValue = ArrayValue | ObjectValue;

export type Value = StackValue | HeapValue;

export type IntLike = IntValue | BooleanValue | CharValue | ShortValue | ByteValue;

/** Concrete argument values a run starts from. */
export type InputValue = IntValue | BooleanValue | CharValue | ArrayValue;

// ========================================================================
// Constructors
// ========================================================================

export function intValue(value: number): IntValue {
  return { kind: "int", value: value | 0 };
}

export function booleanValue(value: boolean): BooleanValue {
  return { kind: "boolean", value };
}

export function charValue(value: number | string): CharValue {
  const code = typeof value === "string" ? value.charCodeAt(0) : value;
  return { kind: "char", value: code & 0xffff };
}

export function shortValue(value: number): ShortValue {
  return { kind: "short", value: (value << 16) >> 16 };
}

export function byteValue(value: number): ByteValue {
  return { kind: "byte", value: (value << 24) >> 24 };
}

export function reference(ref: number | null): ReferenceValue {
  return { kind: "reference", ref };
}

export const NULL_REFERENCE: ReferenceValue = { kind: "reference", ref: null };

// ========================================================================
// Inspection
// ========================================================================

export function isIntLike(value: Value): value is IntLike {
  switch (value.kind) {
    case "int":
    case "boolean":
    case "char":
    case "short":
    case "byte":
      return true;
    default:
      return false;
  }
}

/**
 * Numeric view of an int-category value: booleans widen to 0/1.
 */
export function numericValue(value: IntLike): number {
  return value.kind === "boolean" ? (value.value ? 1 : 0) : value.value;
}

export function isPrimitiveType(type: JvmType): type is PrimitiveType {
  return typeof type === "string";
}

export function isReferenceType(type: JvmType): type is ArrayType | ClassType {
  return typeof type !== "string";
}

/**
 * The zero value a fresh field or array element of the given type holds.
 */
export function defaultValue(type: JvmType): StackValue {
  switch (type) {
    case "int":
      return intValue(0);
    case "boolean":
      return booleanValue(false);
    case "char":
      return charValue(0);
    case "short":
      return shortValue(0);
    case "byte":
      return byteValue(0);
    default:
      return NULL_REFERENCE;
  }
}

/**
 * Converts a raw constant (as found in a class file or an input literal)
 * into a value of the given primitive type.
 */
export function primitiveValue(type: PrimitiveType, raw: number | boolean | string): StackValue {
  switch (type) {
    case "boolean":
      return booleanValue(typeof raw === "boolean" ? raw : Number(raw) !== 0);
    case "char":
      return charValue(typeof raw === "boolean" ? Number(raw) : raw);
    case "int":
      return intValue(Number(raw));
    case "short":
      return shortValue(Number(raw));
    case "byte":
      return byteValue(Number(raw));
  }
}

export function typesEqual(a: JvmType, b: JvmType): boolean {
  if (typeof a === "string" || typeof b === "string") {
    return a === b;
  }
  if (a.kind === "array" && b.kind === "array") {
    return typesEqual(a.type, b.type);
  }
  if (a.kind === "class" && b.kind === "class") {
    return a.name === b.name;
  }
  return false;
}

/**
 * Structural equality by (kind, payload).
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "int":
    case "boolean":
    case "char":
    case "short":
    case "byte":
      return a.kind === b.kind && a.value === b.value;
    case "reference":
      return b.kind === "reference" && a.ref === b.ref;
    case "array":
      return (
        b.kind === "array" &&
        typesEqual(a.elementType, b.elementType) &&
        a.elements.length === b.elements.length &&
        a.elements.every((element, i) => valuesEqual(element, b.elements[i]))
      );
    case "object": {
      if (b.kind !== "object" || a.className !== b.className || a.fields.size !== b.fields.size) {
        return false;
      }
      for (const [name, field] of a.fields) {
        const other = b.fields.get(name);
        if (other === undefined || !valuesEqual(field, other)) {
          return false;
        }
      }
      return true;
    }
  }
}

// ========================================================================
// Display
// ========================================================================

const DESCRIPTOR_LETTERS: Record<PrimitiveType, string> = {
  int: "I",
  boolean: "Z",
  char: "C",
  short: "S",
  byte: "B",
};

export function typeDescriptor(type: JvmType): string {
  if (typeof type === "string") {
    return DESCRIPTOR_LETTERS[type];
  }
  return type.kind === "array" ? `[${typeDescriptor(type.type)}` : `L${type.name};`;
}

export function formatType(type: JvmType): string {
  if (typeof type === "string") {
    return type;
  }
  return type.kind === "array" ? `${formatType(type.type)}[]` : type.name;
}

function formatChar(code: number): string {
  return `'${String.fromCharCode(code)}'`;
}

export function formatValue(value: Value): string {
  switch (value.kind) {
    case "int":
      return String(value.value);
    case "boolean":
      return String(value.value);
    case "char":
      return formatChar(value.value);
    case "short":
      return `(short)${value.value}`;
    case "byte":
      return `(byte)${value.value}`;
    case "reference":
      return value.ref === null ? "null" : `@${value.ref}`;
    case "array":
      return `[${typeDescriptor(value.elementType)}:${value.elements.map(formatValue).join(",")}]`;
    case "object": {
      const fields = Array.from(value.fields, ([name, field]) => `${name}=${formatValue(field)}`);
      return `${value.className}{${fields.join(", ")}}`;
    }
  }
}
