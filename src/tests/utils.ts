import {
  BinaryOperator,
  CastTarget,
  Condition,
  Instruction,
  InvokeAccess,
  LocalType,
} from "../jvm/instructions";
import { MethodId } from "../jvm/method-id";
import { InputValue, JvmType, charValue, intValue, NULL_REFERENCE } from "../jvm/types";
import { MemorySuite } from "../suite/memory-suite";
import { Frame } from "../vm/frame";
import { InstructionStore } from "../vm/instruction-store";
import { Interpreter, InterpreterOptions, RunResult } from "../vm/interpreter";
import { State } from "../vm/state";

export const CASES = "jpamb/cases/Simple";

export function method(
  name: string,
  params: JvmType[] = [],
  returns: JvmType | null = null,
  className: string = CASES
): MethodId {
  return { className, name, params, returns };
}

// ========================================================================
// Instruction builders
// ========================================================================

export const push = (n: number): Instruction => ({ opr: "push", value: intValue(n) });
export const pushChar = (c: string): Instruction => ({ opr: "push", value: charValue(c) });
export const pushNull = (): Instruction => ({ opr: "push", value: NULL_REFERENCE });
export const load = (index: number, type: LocalType = "int"): Instruction => ({ opr: "load", type, index });
export const storeLocal = (index: number, type: LocalType = "int"): Instruction => ({ opr: "store", type, index });
export const binary = (operant: BinaryOperator): Instruction => ({ opr: "binary", operant });
export const incr = (index: number, amount: number): Instruction => ({ opr: "incr", index, amount });
export const dup = (): Instruction => ({ opr: "dup" });
export const pop = (): Instruction => ({ opr: "pop" });
export const ifCmp = (condition: Condition, target: number): Instruction => ({ opr: "if", condition, target });
export const ifz = (condition: Condition, target: number): Instruction => ({ opr: "ifz", condition, target });
export const goto = (target: number): Instruction => ({ opr: "goto", target });
export const ret = (type: LocalType | null = null): Instruction => ({ opr: "return", type });
export const newObject = (className: string): Instruction => ({ opr: "new", className });
export const newArray = (type: JvmType = "int"): Instruction => ({ opr: "newarray", type });
export const arrayLoad = (type: JvmType = "int"): Instruction => ({ opr: "array_load", type });
export const arrayStore = (type: JvmType = "int"): Instruction => ({ opr: "array_store", type });
export const arrayLength = (): Instruction => ({ opr: "arraylength" });
export const cast = (to: CastTarget): Instruction => ({ opr: "cast", from: "int", to });

export const invoke = (access: InvokeAccess, target: MethodId): Instruction => ({
  opr: "invoke",
  access,
  method: target,
});

export const getField = (className: string, name: string, type: JvmType = "int", isStatic = false): Instruction => ({
  opr: "get",
  static: isStatic,
  field: { className, name, type },
});

export const putField = (className: string, name: string, type: JvmType = "int", isStatic = false): Instruction => ({
  opr: "put",
  static: isStatic,
  field: { className, name, type },
});

// ========================================================================
// Running
// ========================================================================

/**
 * Helper building a suite holding a single method body
 */
export function suiteOf(target: MethodId, code: Instruction[]): MemorySuite {
  return new MemorySuite().addMethod(target, code);
}

/**
 * Helper running a method to completion
 */
export function run(
  suite: MemorySuite,
  target: MethodId,
  inputs: InputValue[] = [],
  options?: InterpreterOptions
): RunResult {
  return new Interpreter(suite, options).run(target, inputs);
}

/**
 * A state whose only frame is a fresh activation of `target`, plus the
 * store to step it against.
 */
export function stateFor(suite: MemorySuite, target: MethodId): { state: State; store: InstructionStore } {
  const state = new State();
  state.pushFrame(Frame.forMethod(target));
  return { state, store: new InstructionStore(suite) };
}
