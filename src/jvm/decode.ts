import { MalformedBytecodeError, UnsupportedInstructionError } from "../vm/errors";
import {
  BinaryOperator,
  CastTarget,
  Condition,
  Instruction,
  InvokeAccess,
  LocalType,
} from "./instructions";
import { FieldRef, MethodId, OBJECT_CLASS } from "./method-id";
import {
  JvmType,
  NULL_REFERENCE,
  PRIMITIVE_TYPES,
  PrimitiveType,
  StackValue,
  primitiveValue,
} from "./types";

/**
 * Decoding of the JSON class-file format into the closed instruction and
 * type models. Every record is validated; anything the interpreter does not
 * model is rejected here rather than at run time.
 */

const BINARY_OPERATORS: readonly BinaryOperator[] = [
  "add", "sub", "mul", "div", "rem", "and", "or", "xor", "shl", "shr", "ushr",
];

const CONDITIONS: readonly Condition[] = ["eq", "ne", "lt", "ge", "gt", "le", "is", "isnot"];

const INVOKE_ACCESS: readonly InvokeAccess[] = ["static", "special", "virtual"];

const CAST_TARGETS: readonly CastTarget[] = ["short", "byte", "char"];

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  return JSON.stringify(value) ?? String(value);
}

function oneOf<T extends string>(options: readonly T[], value: unknown): value is T {
  return typeof value === "string" && options.some(option => option === value);
}

export function requireRecord(value: unknown, what: string): JsonRecord {
  if (!isRecord(value)) {
    throw new MalformedBytecodeError(`Expected ${what} to be an object, got ${describe(value)}`);
  }
  return value;
}

export function requireString(record: JsonRecord, key: string): string {
  const value = record[key];
  if (typeof value !== "string") {
    throw new MalformedBytecodeError(`Expected string '${key}' in ${describe(record)}`);
  }
  return value;
}

export function requireNumber(record: JsonRecord, key: string): number {
  const value = record[key];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new MalformedBytecodeError(`Expected integer '${key}' in ${describe(record)}`);
  }
  return value;
}

export function requireArray(record: JsonRecord, key: string): unknown[] {
  const value = record[key];
  if (!Array.isArray(value)) {
    throw new MalformedBytecodeError(`Expected array '${key}' in ${describe(record)}`);
  }
  return value;
}

function optionalNumber(record: JsonRecord, key: string, fallback: number): number {
  return record[key] === undefined ? fallback : requireNumber(record, key);
}

// ========================================================================
// Types
// ========================================================================

export function decodePrimitiveType(json: unknown): PrimitiveType {
  if (oneOf(PRIMITIVE_TYPES, json)) {
    return json;
  }
  if (json === "integer") {
    return "int";
  }
  throw new UnsupportedInstructionError(`operand type ${describe(json)}`);
}

export function decodeType(json: unknown): JvmType {
  if (typeof json === "string") {
    return decodePrimitiveType(json);
  }
  const record = requireRecord(json, "type");
  // Class files spell field types as `{ "base": "int" }`.
  if (record.kind === undefined && record.base !== undefined) {
    return decodePrimitiveType(record.base);
  }
  switch (record.kind) {
    case "array":
      return { kind: "array", type: decodeType(record.type) };
    case "class":
      return { kind: "class", name: requireString(record, "name") };
    default:
      throw new MalformedBytecodeError(`Unknown type encoding ${describe(json)}`);
  }
}

/** `null` or absent means `void`. */
export function decodeReturnType(json: unknown): JvmType | null {
  return json === null || json === undefined ? null : decodeType(json);
}

function decodeLocalType(json: unknown): LocalType {
  if (json === "int" || json === "ref") {
    return json;
  }
  if (json === "boolean" || json === "char" || json === "short" || json === "byte") {
    return "int";
  }
  throw new UnsupportedInstructionError(`local of type ${describe(json)}`);
}

/** Array element types accept `ref` as shorthand for an object array. */
function decodeElementType(json: unknown): JvmType {
  return json === "ref" ? { kind: "class", name: OBJECT_CLASS } : decodeType(json);
}

function decodeConstant(json: unknown): StackValue {
  if (json === null) {
    return NULL_REFERENCE;
  }
  const record = requireRecord(json, "constant");
  const type = decodePrimitiveType(record.type);
  const raw = record.value;
  if (typeof raw !== "number" && typeof raw !== "boolean" && typeof raw !== "string") {
    throw new MalformedBytecodeError(`Bad constant value ${describe(json)}`);
  }
  return primitiveValue(type, raw);
}

export function decodeFieldRef(json: unknown): FieldRef {
  const record = requireRecord(json, "field reference");
  return {
    className: requireString(record, "class"),
    name: requireString(record, "name"),
    type: decodeType(record.type),
  };
}

export function decodeMethodRef(json: unknown): MethodId {
  const record = requireRecord(json, "method reference");
  return {
    className: requireString(record, "class"),
    name: requireString(record, "name"),
    params: requireArray(record, "args").map(decodeType),
    returns: decodeReturnType(record.returns),
  };
}

// ========================================================================
// Instructions
// ========================================================================

function decodeCondition(record: JsonRecord): Condition {
  const condition = record.condition;
  if (!oneOf(CONDITIONS, condition)) {
    throw new UnsupportedInstructionError(`branch condition ${describe(condition)}`);
  }
  return condition;
}

function requireSingleWord(record: JsonRecord): void {
  if (optionalNumber(record, "words", 1) !== 1) {
    throw new UnsupportedInstructionError(describe(record));
  }
}

export function decodeInstruction(json: unknown): Instruction {
  const record = requireRecord(json, "instruction");
  const opr = record.opr;

  switch (opr) {
    case "push":
      return { opr: "push", value: decodeConstant(record.value) };

    case "load":
      return { opr: "load", type: decodeLocalType(record.type), index: requireNumber(record, "index") };

    case "store":
      return { opr: "store", type: decodeLocalType(record.type), index: requireNumber(record, "index") };

    case "binary": {
      if (record.type !== undefined && decodePrimitiveType(record.type) !== "int") {
        throw new UnsupportedInstructionError(describe(record));
      }
      const operant = record.operant;
      if (!oneOf(BINARY_OPERATORS, operant)) {
        throw new UnsupportedInstructionError(`binary operator ${describe(operant)}`);
      }
      return { opr: "binary", operant };
    }

    case "negate":
      if (record.type !== undefined && decodePrimitiveType(record.type) !== "int") {
        throw new UnsupportedInstructionError(describe(record));
      }
      return { opr: "negate" };

    case "incr":
      return { opr: "incr", index: requireNumber(record, "index"), amount: requireNumber(record, "amount") };

    case "dup":
      requireSingleWord(record);
      return { opr: "dup" };

    case "pop":
      requireSingleWord(record);
      return { opr: "pop" };

    case "if":
      return { opr: "if", condition: decodeCondition(record), target: requireNumber(record, "target") };

    case "ifz":
      return { opr: "ifz", condition: decodeCondition(record), target: requireNumber(record, "target") };

    case "goto":
      return { opr: "goto", target: requireNumber(record, "target") };

    case "get":
      return { opr: "get", static: record.static === true, field: decodeFieldRef(record.field) };

    case "put":
      return { opr: "put", static: record.static === true, field: decodeFieldRef(record.field) };

    case "new":
      return { opr: "new", className: requireString(record, "class") };

    case "newarray":
      if (optionalNumber(record, "dim", 1) !== 1) {
        throw new UnsupportedInstructionError(describe(record));
      }
      return { opr: "newarray", type: decodeElementType(record.type) };

    case "array_load":
      return { opr: "array_load", type: decodeElementType(record.type) };

    case "array_store":
      return { opr: "array_store", type: decodeElementType(record.type) };

    case "arraylength":
      return { opr: "arraylength" };

    case "invoke": {
      const access = record.access;
      if (!oneOf(INVOKE_ACCESS, access)) {
        throw new UnsupportedInstructionError(`invoke ${describe(access)}`);
      }
      return { opr: "invoke", access, method: decodeMethodRef(record.method) };
    }

    case "return":
      return {
        opr: "return",
        type: record.type === null || record.type === undefined ? null : decodeLocalType(record.type),
      };

    case "cast": {
      const from = decodePrimitiveType(record.from);
      const to = decodePrimitiveType(record.to);
      if (from !== "int" || !oneOf(CAST_TARGETS, to)) {
        throw new UnsupportedInstructionError(`cast ${from} to ${to}`);
      }
      return { opr: "cast", from, to };
    }

    default:
      throw new UnsupportedInstructionError(describe(record));
  }
}

export function decodeInstructions(json: unknown[]): Instruction[] {
  return json.map(decodeInstruction);
}
