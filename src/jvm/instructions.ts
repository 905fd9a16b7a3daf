import { FieldRef, MethodId, formatFieldRef, formatMethodId } from "./method-id";
import { JvmType, StackValue, formatType, formatValue } from "./types";

export type BinaryOperator =
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "rem"
  | "and"
  | "or"
  | "xor"
  | "shl"
  | "shr"
  | "ushr";

export type Condition = "eq" | "ne" | "lt" | "ge" | "gt" | "le" | "is" | "isnot";

/** Operand category a load or store declares for its local slot. */
export type LocalType = "int" | "ref";

export type InvokeAccess = "static" | "special" | "virtual";

export interface Push {
  opr: "push";
  value: StackValue;
}

export interface Load {
  opr: "load";
  type: LocalType;
  index: number;
}

export interface Store {
  opr: "store";
  type: LocalType;
  index: number;
}

export interface Binary {
  opr: "binary";
  operant: BinaryOperator;
}

export interface Negate {
  opr: "negate";
}

export interface Incr {
  opr: "incr";
  index: number;
  amount: number;
}

export interface Dup {
  opr: "dup";
}

export interface Pop {
  opr: "pop";
}

/** Two-operand comparison (`if_icmp*`, `if_acmp*`). */
export interface If {
  opr: "if";
  condition: Condition;
  target: number;
}

/** Comparison against zero or null (`if*`, `ifnull`, `ifnonnull`). */
export interface Ifz {
  opr: "ifz";
  condition: Condition;
  target: number;
}

export interface Goto {
  opr: "goto";
  target: number;
}

export interface Get {
  opr: "get";
  static: boolean;
  field: FieldRef;
}

export interface Put {
  opr: "put";
  static: boolean;
  field: FieldRef;
}

export interface New {
  opr: "new";
  className: string;
}

export interface NewArray {
  opr: "newarray";
  type: JvmType;
}

export interface ArrayLoad {
  opr: "array_load";
  type: JvmType;
}

export interface ArrayStore {
  opr: "array_store";
  type: JvmType;
}

export interface ArrayLength {
  opr: "arraylength";
}

export interface Invoke {
  opr: "invoke";
  access: InvokeAccess;
  method: MethodId;
}

export interface Return {
  opr: "return";
  type: LocalType | null;
}

/** Only the int narrowing conversions are modelled. */
export type CastTarget = "short" | "byte" | "char";

export interface Cast {
  opr: "cast";
  from: "int";
  to: CastTarget;
}

export type Instruction =
  | Push
  | Load
  | Store
  | Binary
  | Negate
  | Incr
  | Dup
  | Pop
  | If
  | Ifz
  | Goto
  | Get
  | Put
  | New
  | NewArray
  | ArrayLoad
  | ArrayStore
  | ArrayLength
  | Invoke
  | Return
  | Cast;

export type Opr = Instruction["opr"];

export function assertNever(value: never): never {
  throw new Error(`Unexpected variant: ${JSON.stringify(value)}`);
}

/**
 * One-line listing of an instruction, as printed by traces and the
 * disassembler.
 */
export function formatInstruction(instr: Instruction): string {
  switch (instr.opr) {
    case "push":
      return `push ${formatValue(instr.value)}`;
    case "load":
    case "store":
      return `${instr.opr}:${instr.type} ${instr.index}`;
    case "binary":
      return `binary ${instr.operant}`;
    case "negate":
    case "dup":
    case "pop":
    case "arraylength":
      return instr.opr;
    case "incr":
      return `incr ${instr.index} by ${instr.amount}`;
    case "if":
    case "ifz":
      return `${instr.opr} ${instr.condition} ${instr.target}`;
    case "goto":
      return `goto ${instr.target}`;
    case "get":
    case "put":
      return `${instr.opr}${instr.static ? " static" : ""} ${formatFieldRef(instr.field)}`;
    case "new":
      return `new ${instr.className}`;
    case "newarray":
    case "array_load":
    case "array_store":
      return `${instr.opr}:${formatType(instr.type)}`;
    case "invoke":
      return `invoke ${instr.access} ${formatMethodId(instr.method)}`;
    case "return":
      return instr.type === null ? "return" : `return:${instr.type}`;
    case "cast":
      return `cast ${instr.from} to ${instr.to}`;
    default:
      return assertNever(instr);
  }
}
