import { ArrayValue, HeapValue, ObjectValue, formatValue } from "../jvm/types";
import { MalformedBytecodeError, TypeAssertionError } from "./errors";

/**
 * Store of arrays and objects addressed by integer references. References
 * come from a monotonically increasing counter; entries are never removed.
 */
export class Heap {
  private entries = new Map<number, HeapValue>();
  private nextRef = 0;

  allocate(value: HeapValue): number {
    const ref = this.nextRef++;
    this.entries.set(ref, value);
    return ref;
  }

  has(ref: number): boolean {
    return this.entries.has(ref);
  }

  get(ref: number): HeapValue {
    const value = this.entries.get(ref);
    if (value === undefined) {
      throw new MalformedBytecodeError(`Dangling heap reference @${ref}`);
    }
    return value;
  }

  getArray(ref: number, where: string): ArrayValue {
    const value = this.get(ref);
    if (value.kind !== "array") {
      throw new TypeAssertionError("array", value.kind, where);
    }
    return value;
  }

  getObject(ref: number, where: string): ObjectValue {
    const value = this.get(ref);
    if (value.kind !== "object") {
      throw new TypeAssertionError("object", value.kind, where);
    }
    return value;
  }

  /**
   * Swaps the entry behind a live reference for a new value.
   */
  replace(ref: number, value: HeapValue): void {
    if (!this.entries.has(ref)) {
      throw new MalformedBytecodeError(`Dangling heap reference @${ref}`);
    }
    this.entries.set(ref, value);
  }

  get size(): number {
    return this.entries.size;
  }

  toString(): string {
    return Array.from(this.entries, ([ref, value]) => `@${ref}=${formatValue(value)}`).join(", ");
  }
}
