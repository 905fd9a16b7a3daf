import {
  ArrayStore,
  BinaryOperator,
  Cast,
  Condition,
  Get,
  Instruction,
  Invoke,
  LocalType,
  New,
  NewArray,
  Put,
  Return,
  assertNever,
} from "../jvm/instructions";
import { formatFieldRef, isObjectConstructor } from "../jvm/method-id";
import {
  ArrayValue,
  IntLike,
  JvmType,
  ObjectValue,
  StackValue,
  booleanValue,
  byteValue,
  charValue,
  defaultValue,
  formatType,
  intValue,
  isIntLike,
  numericValue,
  reference,
  shortValue,
} from "../jvm/types";
import { MalformedBytecodeError, TypeAssertionError } from "./errors";
import { Frame, formatPc } from "./frame";
import { InstructionStore } from "./instruction-store";
import { Outcome } from "./outcome";
import { State } from "./state";

export const ASSERTION_ERROR_CLASS = "java/lang/AssertionError";

/**
 * Either the state to continue from, or the terminal outcome of the run.
 * `returned` carries the value handed back by the outermost frame, if any.
 */
export type StepResult =
  | { done: false; state: State }
  | { done: true; outcome: Outcome; returned: StackValue | null };

function proceed(state: State): StepResult {
  return { done: false, state };
}

function halt(outcome: Outcome, returned: StackValue | null = null): StepResult {
  return { done: true, outcome, returned };
}

// ========================================================================
// Operand helpers
// ========================================================================

function expectIntLike(value: StackValue, frame: Frame): IntLike {
  if (!isIntLike(value)) {
    throw new TypeAssertionError("int", value.kind, formatPc(frame.pc));
  }
  return value;
}

function popInt(frame: Frame): number {
  return numericValue(expectIntLike(frame.stack.pop(), frame));
}

/** Pops a reference and yields its heap key, `null` for the null reference. */
function popReference(frame: Frame): number | null {
  const value = frame.stack.pop();
  if (value.kind !== "reference") {
    throw new TypeAssertionError("reference", value.kind, formatPc(frame.pc));
  }
  return value.ref;
}

function checkCategory(type: LocalType, value: StackValue, frame: Frame): StackValue {
  const matches = type === "int" ? isIntLike(value) : value.kind === "reference";
  if (!matches) {
    throw new TypeAssertionError(type, value.kind, formatPc(frame.pc));
  }
  return value;
}

/**
 * Pops `count` values and returns them in the order they were pushed.
 */
function popArguments(frame: Frame, count: number): StackValue[] {
  const args: StackValue[] = [];
  for (let i = 0; i < count; i++) {
    args.unshift(frame.stack.pop());
  }
  return args;
}

// ========================================================================
// Arithmetic and comparison
// ========================================================================

/**
 * 32-bit two's complement arithmetic; `null` signals division by zero.
 */
export function applyBinary(operator: BinaryOperator, left: number, right: number): number | null {
  switch (operator) {
    case "add":
      return (left + right) | 0;
    case "sub":
      return (left - right) | 0;
    case "mul":
      return Math.imul(left, right);
    case "div":
      return right === 0 ? null : (left / right) | 0;
    case "rem":
      return right === 0 ? null : (left % right) | 0;
    case "and":
      return left & right;
    case "or":
      return left | right;
    case "xor":
      return left ^ right;
    case "shl":
      return left << right;
    case "shr":
      return left >> right;
    case "ushr":
      return (left >>> right) | 0;
    default:
      return assertNever(operator);
  }
}

function isOrdering(condition: Condition): boolean {
  return condition === "lt" || condition === "ge" || condition === "gt" || condition === "le";
}

/**
 * Numeric view of a branch operand. References only take part in the
 * identity predicates.
 */
function comparand(value: StackValue, condition: Condition, frame: Frame): number | null {
  if (value.kind === "reference") {
    if (isOrdering(condition)) {
      throw new TypeAssertionError("int", "reference", formatPc(frame.pc));
    }
    return value.ref;
  }
  return numericValue(expectIntLike(value, frame));
}

function ordered(left: number | null, right: number | null, where: string): [number, number] {
  if (left === null || right === null) {
    throw new TypeAssertionError("int", "reference", where);
  }
  return [left, right];
}

/**
 * Evaluates `left <condition> right`. Identity predicates also accept
 * references (`null` being the null reference); ordering predicates do not.
 */
export function compare(condition: Condition, left: number | null, right: number | null, where: string): boolean {
  switch (condition) {
    case "eq":
    case "is":
      return left === right;
    case "ne":
    case "isnot":
      return left !== right;
    case "lt": {
      const [a, b] = ordered(left, right, where);
      return a < b;
    }
    case "ge": {
      const [a, b] = ordered(left, right, where);
      return a >= b;
    }
    case "gt": {
      const [a, b] = ordered(left, right, where);
      return a > b;
    }
    case "le": {
      const [a, b] = ordered(left, right, where);
      return a <= b;
    }
    default:
      return assertNever(condition);
  }
}

// ========================================================================
// Heap instructions
// ========================================================================

/**
 * Converts a value about to be written into an array slot to the array's
 * element type, narrowing ints the way the typed array stores do.
 */
function coerceElement(elementType: JvmType, value: StackValue, frame: Frame): StackValue {
  switch (elementType) {
    case "int":
      return intValue(numericValue(expectIntLike(value, frame)));
    case "boolean":
      return booleanValue((numericValue(expectIntLike(value, frame)) & 1) !== 0);
    case "char":
      return charValue(numericValue(expectIntLike(value, frame)));
    case "short":
      return shortValue(numericValue(expectIntLike(value, frame)));
    case "byte":
      return byteValue(numericValue(expectIntLike(value, frame)));
    default:
      if (value.kind !== "reference") {
        throw new TypeAssertionError(formatType(elementType), value.kind, formatPc(frame.pc));
      }
      return value;
  }
}

function newObject(state: State, store: InstructionStore, frame: Frame, instr: New): StepResult {
  if (instr.className === ASSERTION_ERROR_CLASS) {
    return halt(Outcome.AssertionError);
  }
  const fields = new Map<string, StackValue>();
  for (const field of store.findClass(instr.className).fields) {
    if (!field.static) {
      fields.set(field.name, defaultValue(field.type));
    }
  }
  const object: ObjectValue = { kind: "object", className: instr.className, fields };
  frame.stack.push(reference(state.heap.allocate(object)));
  frame.advance();
  return proceed(state);
}

function newArray(state: State, frame: Frame, instr: NewArray): StepResult {
  const length = popInt(frame);
  if (length < 0) {
    return halt(Outcome.OutOfBounds);
  }
  const array: ArrayValue = {
    kind: "array",
    elementType: instr.type,
    elements: new Array<StackValue>(length).fill(defaultValue(instr.type)),
  };
  frame.stack.push(reference(state.heap.allocate(array)));
  frame.advance();
  return proceed(state);
}

function arrayLoad(state: State, frame: Frame): StepResult {
  const index = popInt(frame);
  const ref = popReference(frame);
  if (ref === null) {
    return halt(Outcome.NullPointer);
  }
  const array = state.heap.getArray(ref, formatPc(frame.pc));
  if (index < 0 || index >= array.elements.length) {
    return halt(Outcome.OutOfBounds);
  }
  frame.stack.push(array.elements[index]);
  frame.advance();
  return proceed(state);
}

function arrayStore(state: State, frame: Frame, instr: ArrayStore): StepResult {
  const value = frame.stack.pop();
  const index = popInt(frame);
  const ref = popReference(frame);
  if (ref === null) {
    return halt(Outcome.NullPointer);
  }
  const array = state.heap.getArray(ref, formatPc(frame.pc));
  if (index < 0 || index >= array.elements.length) {
    return halt(Outcome.OutOfBounds);
  }
  // Copy-on-write: the heap slot gets a new array value.
  const elements = [...array.elements];
  elements[index] = coerceElement(array.elementType, value, frame);
  state.heap.replace(ref, { kind: "array", elementType: array.elementType, elements });
  frame.advance();
  return proceed(state);
}

function arrayLength(state: State, frame: Frame): StepResult {
  const ref = popReference(frame);
  if (ref === null) {
    return halt(Outcome.NullPointer);
  }
  frame.stack.push(intValue(state.heap.getArray(ref, formatPc(frame.pc)).elements.length));
  frame.advance();
  return proceed(state);
}

function getField(state: State, store: InstructionStore, frame: Frame, instr: Get): StepResult {
  if (instr.static) {
    const key = formatFieldRef(instr.field);
    frame.stack.push(state.statics.get(key) ?? store.staticValue(instr.field));
    frame.advance();
    return proceed(state);
  }
  const ref = popReference(frame);
  if (ref === null) {
    return halt(Outcome.NullPointer);
  }
  const value = state.heap.getObject(ref, formatPc(frame.pc)).fields.get(instr.field.name);
  if (value === undefined) {
    throw new MalformedBytecodeError(`Field ${formatFieldRef(instr.field)} not found in object @${ref}`);
  }
  frame.stack.push(value);
  frame.advance();
  return proceed(state);
}

function putField(state: State, frame: Frame, instr: Put): StepResult {
  const value = frame.stack.pop();
  if (instr.static) {
    state.statics.set(formatFieldRef(instr.field), value);
    frame.advance();
    return proceed(state);
  }
  const ref = popReference(frame);
  if (ref === null) {
    return halt(Outcome.NullPointer);
  }
  // Objects are updated in place: every reference to the key sees the write.
  state.heap.getObject(ref, formatPc(frame.pc)).fields.set(instr.field.name, value);
  frame.advance();
  return proceed(state);
}

// ========================================================================
// Calls
// ========================================================================

function invoke(state: State, frame: Frame, instr: Invoke): StepResult {
  const { method } = instr;

  if (instr.access === "special" && isObjectConstructor(method)) {
    // The root constructor does nothing; only its receiver is consumed.
    popReference(frame);
    frame.advance();
    return proceed(state);
  }

  const hasReceiver = instr.access !== "static";
  const args = popArguments(frame, method.params.length + (hasReceiver ? 1 : 0));
  if (hasReceiver) {
    const receiver = args[0];
    if (receiver.kind !== "reference") {
      throw new TypeAssertionError("reference", receiver.kind, formatPc(frame.pc));
    }
    if (receiver.ref === null) {
      return halt(Outcome.NullPointer);
    }
  }

  // The caller's pc stays on the invoke until the callee returns.
  state.pushFrame(Frame.forMethod(method, args));
  return proceed(state);
}

function doReturn(state: State, frame: Frame, instr: Return): StepResult {
  const returned = instr.type === null ? null : checkCategory(instr.type, frame.stack.pop(), frame);
  state.popFrame();
  if (state.depth === 0) {
    return halt(Outcome.Ok, returned);
  }
  const caller = state.top;
  if (returned !== null) {
    caller.stack.push(returned);
  }
  caller.advance();
  return proceed(state);
}

function cast(state: State, frame: Frame, instr: Cast): StepResult {
  const source = expectIntLike(frame.stack.pop(), frame);
  if (source.kind === "boolean") {
    throw new TypeAssertionError(instr.from, source.kind, formatPc(frame.pc));
  }
  const n = numericValue(source);
  switch (instr.to) {
    case "short":
      frame.stack.push(shortValue(n));
      break;
    case "byte":
      frame.stack.push(byteValue(n));
      break;
    case "char":
      frame.stack.push(charValue(n));
      break;
    default:
      return assertNever(instr.to);
  }
  frame.advance();
  return proceed(state);
}

// ========================================================================
// Transition function
// ========================================================================

/**
 * Executes exactly the instruction addressed by the top frame's program
 * counter. The state is consumed: the returned state is the same object,
 * updated in place, and the caller must not keep the old one.
 */
export function step(state: State, store: InstructionStore): StepResult {
  const frame = state.top;
  const instr: Instruction = store.at(frame.pc);

  switch (instr.opr) {
    case "push":
      frame.stack.push(instr.value);
      frame.advance();
      return proceed(state);

    case "load":
      frame.stack.push(checkCategory(instr.type, frame.load(instr.index), frame));
      frame.advance();
      return proceed(state);

    case "store":
      frame.store(instr.index, checkCategory(instr.type, frame.stack.pop(), frame));
      frame.advance();
      return proceed(state);

    case "binary": {
      const right = popInt(frame);
      const left = popInt(frame);
      const result = applyBinary(instr.operant, left, right);
      if (result === null) {
        return halt(Outcome.DivideByZero);
      }
      frame.stack.push(intValue(result));
      frame.advance();
      return proceed(state);
    }

    case "negate":
      frame.stack.push(intValue(-popInt(frame)));
      frame.advance();
      return proceed(state);

    case "incr": {
      const current = numericValue(expectIntLike(frame.load(instr.index), frame));
      frame.store(instr.index, intValue(current + instr.amount));
      frame.advance();
      return proceed(state);
    }

    case "dup":
      frame.stack.push(frame.stack.peek());
      frame.advance();
      return proceed(state);

    case "pop":
      frame.stack.pop();
      frame.advance();
      return proceed(state);

    case "if": {
      const right = comparand(frame.stack.pop(), instr.condition, frame);
      const left = comparand(frame.stack.pop(), instr.condition, frame);
      if (compare(instr.condition, left, right, formatPc(frame.pc))) {
        frame.jump(instr.target);
      } else {
        frame.advance();
      }
      return proceed(state);
    }

    case "ifz": {
      const value = frame.stack.pop();
      const left = comparand(value, instr.condition, frame);
      const right = value.kind === "reference" ? null : 0;
      if (compare(instr.condition, left, right, formatPc(frame.pc))) {
        frame.jump(instr.target);
      } else {
        frame.advance();
      }
      return proceed(state);
    }

    case "goto":
      frame.jump(instr.target);
      return proceed(state);

    case "get":
      return getField(state, store, frame, instr);

    case "put":
      return putField(state, frame, instr);

    case "new":
      return newObject(state, store, frame, instr);

    case "newarray":
      return newArray(state, frame, instr);

    case "array_load":
      return arrayLoad(state, frame);

    case "array_store":
      return arrayStore(state, frame, instr);

    case "arraylength":
      return arrayLength(state, frame);

    case "invoke":
      return invoke(state, frame, instr);

    case "return":
      return doReturn(state, frame, instr);

    case "cast":
      return cast(state, frame, instr);

    default:
      return assertNever(instr);
  }
}
