import { InputParseError } from "../vm/errors";
import { JvmType, PrimitiveType, typeDescriptor } from "./types";

/**
 * Identifies a method by its internal class name (slash separated), its
 * simple name and its descriptor.
 */
export interface MethodId {
  className: string;
  name: string;
  params: JvmType[];
  returns: JvmType | null;
}

export interface FieldRef {
  className: string;
  name: string;
  type: JvmType;
}

export const OBJECT_CLASS = "java/lang/Object";
export const CONSTRUCTOR_NAME = "<init>";

const PRIMITIVE_LETTERS: Record<string, PrimitiveType> = {
  I: "int",
  Z: "boolean",
  C: "char",
  S: "short",
  B: "byte",
};

/**
 * Reads one field type starting at `start`; returns it with the index just
 * past its last character.
 */
function readFieldType(descriptor: string, start: number): [JvmType, number] {
  const letter = descriptor[start];
  if (letter === undefined) {
    throw new InputParseError(`Truncated descriptor '${descriptor}'`);
  }
  const primitive = PRIMITIVE_LETTERS[letter];
  if (primitive !== undefined) {
    return [primitive, start + 1];
  }
  if (letter === "[") {
    const [element, end] = readFieldType(descriptor, start + 1);
    return [{ kind: "array", type: element }, end];
  }
  if (letter === "L") {
    const end = descriptor.indexOf(";", start);
    if (end < 0) {
      throw new InputParseError(`Unterminated class type in descriptor '${descriptor}'`);
    }
    return [{ kind: "class", name: descriptor.slice(start + 1, end) }, end + 1];
  }
  throw new InputParseError(`Unknown type '${letter}' in descriptor '${descriptor}'`);
}

export function parseFieldDescriptor(descriptor: string): JvmType {
  const [type, end] = readFieldType(descriptor, 0);
  if (end !== descriptor.length) {
    throw new InputParseError(`Trailing characters in descriptor '${descriptor}'`);
  }
  return type;
}

export function parseMethodDescriptor(descriptor: string): Pick<MethodId, "params" | "returns"> {
  if (!descriptor.startsWith("(")) {
    throw new InputParseError(`Method descriptor must start with '(': '${descriptor}'`);
  }
  const params: JvmType[] = [];
  let cursor = 1;
  while (descriptor[cursor] !== ")") {
    const [param, end] = readFieldType(descriptor, cursor);
    params.push(param);
    cursor = end;
  }
  const rest = descriptor.slice(cursor + 1);
  const returns = rest === "V" ? null : parseFieldDescriptor(rest);
  return { params, returns };
}

/**
 * Parses `jpamb.cases.Simple.divide:(II)I` (dots or slashes in the class
 * name) into a method identifier.
 */
export function parseMethodId(text: string): MethodId {
  const colon = text.indexOf(":");
  if (colon < 0) {
    throw new InputParseError(`Method identifier '${text}' has no descriptor`);
  }
  const qualified = text.slice(0, colon).trim();
  const dot = qualified.lastIndexOf(".");
  if (dot <= 0 || dot === qualified.length - 1) {
    throw new InputParseError(`Method identifier '${text}' must be <class>.<method>:<descriptor>`);
  }
  const className = qualified.slice(0, dot).replace(/\./g, "/");
  const name = qualified.slice(dot + 1);
  return { className, name, ...parseMethodDescriptor(text.slice(colon + 1).trim()) };
}

export function methodDescriptor(method: Pick<MethodId, "params" | "returns">): string {
  const params = method.params.map(typeDescriptor).join("");
  return `(${params})${method.returns === null ? "V" : typeDescriptor(method.returns)}`;
}

export function formatMethodId(method: MethodId): string {
  return `${method.className}.${method.name}:${methodDescriptor(method)}`;
}

export function formatFieldRef(field: FieldRef): string {
  return `${field.className}.${field.name}:${typeDescriptor(field.type)}`;
}

export function isObjectConstructor(method: MethodId): boolean {
  return method.className === OBJECT_CLASS && method.name === CONSTRUCTOR_NAME;
}
