import { StackValue, formatValue } from "../jvm/types";
import { MalformedBytecodeError } from "./errors";

/**
 * LIFO working storage of one frame.
 */
export class OperandStack {
  private items: StackValue[];

  constructor(items: StackValue[] = []) {
    this.items = [...items];
  }

  push(value: StackValue): void {
    this.items.push(value);
  }

  pop(): StackValue {
    const value = this.items.pop();
    if (value === undefined) {
      throw new MalformedBytecodeError("Stack underflow");
    }
    return value;
  }

  peek(): StackValue {
    if (this.items.length === 0) {
      throw new MalformedBytecodeError("Stack underflow on peek");
    }
    return this.items[this.items.length - 1];
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  toArray(): StackValue[] {
    return [...this.items];
  }

  toString(): string {
    return this.items.length === 0 ? "ϵ" : this.items.map(formatValue).join(" ");
  }
}
