import { MethodId, formatMethodId } from "../jvm/method-id";
import { StackValue, formatValue } from "../jvm/types";
import { UninitializedLocalError } from "./errors";
import { OperandStack } from "./operand-stack";

/**
 * Addressing pair of method and instruction index. Program counters are
 * never mutated; moving control produces a new one.
 */
export interface ProgramCounter {
  readonly method: MethodId;
  readonly offset: number;
}

export function programCounter(method: MethodId, offset: number = 0): ProgramCounter {
  return { method, offset };
}

export function advance(pc: ProgramCounter, delta: number = 1): ProgramCounter {
  return { method: pc.method, offset: pc.offset + delta };
}

export function jumpTo(pc: ProgramCounter, target: number): ProgramCounter {
  return { method: pc.method, offset: target };
}

export function formatPc(pc: ProgramCounter): string {
  return `${formatMethodId(pc.method)}:${pc.offset}`;
}

/**
 * One method activation: local slots, an operand stack and a program
 * counter.
 */
export class Frame {
  readonly locals: Map<number, StackValue>;
  readonly stack: OperandStack;
  pc: ProgramCounter;

  constructor(pc: ProgramCounter, locals: Map<number, StackValue> = new Map(), stack: OperandStack = new OperandStack()) {
    this.pc = pc;
    this.locals = locals;
    this.stack = stack;
  }

  /**
   * Fresh activation of `method` with `args` bound to slots 0..n-1 in call
   * order.
   */
  static forMethod(method: MethodId, args: readonly StackValue[] = []): Frame {
    const locals = new Map<number, StackValue>();
    args.forEach((arg, slot) => locals.set(slot, arg));
    return new Frame(programCounter(method), locals);
  }

  load(slot: number): StackValue {
    const value = this.locals.get(slot);
    if (value === undefined) {
      throw new UninitializedLocalError(slot, formatPc(this.pc));
    }
    return value;
  }

  store(slot: number, value: StackValue): void {
    this.locals.set(slot, value);
  }

  advance(delta: number = 1): void {
    this.pc = advance(this.pc, delta);
  }

  jump(target: number): void {
    this.pc = jumpTo(this.pc, target);
  }

  toString(): string {
    const locals = Array.from(this.locals, ([slot, value]) => `${slot}:${formatValue(value)}`).join(", ");
    return `<{${locals}}, ${this.stack.toString()}, ${formatPc(this.pc)}>`;
  }
}
