import { intValue, reference } from "../jvm/types";
import { MalformedBytecodeError, TypeAssertionError, UninitializedLocalError } from "../vm/errors";
import { Frame, advance, formatPc, jumpTo, programCounter } from "../vm/frame";
import { Heap } from "../vm/heap";
import { OperandStack } from "../vm/operand-stack";
import { State } from "../vm/state";
import { method } from "./utils";

describe('Runtime structures', () => {
  describe('Operand stack', () => {
    test('Pops in reverse push order', () => {
      const stack = new OperandStack();
      stack.push(intValue(1));
      stack.push(intValue(2));
      expect(stack.toString()).toBe("1 2");
      expect(stack.pop()).toEqual(intValue(2));
      expect(stack.peek()).toEqual(intValue(1));
      expect(stack.size).toBe(1);
    });

    test('Underflow', () => {
      const stack = new OperandStack();
      expect(stack.isEmpty()).toBe(true);
      expect(stack.toString()).toBe("ϵ");
      expect(() => stack.pop()).toThrow(MalformedBytecodeError);
      expect(() => stack.peek()).toThrow("Stack underflow on peek");
    });

    test('Snapshots do not alias the stack', () => {
      const stack = new OperandStack([intValue(1)]);
      const snapshot = stack.toArray();
      stack.push(intValue(2));
      expect(snapshot).toEqual([intValue(1)]);
    });
  });

  describe('Program counters and frames', () => {
    const target = method("divide", ["int", "int"], "int");

    test('Moving control yields a new counter', () => {
      const pc = programCounter(target);
      const next = advance(pc);
      expect(pc.offset).toBe(0);
      expect(next.offset).toBe(1);
      expect(jumpTo(next, 7).offset).toBe(7);
      expect(formatPc(next)).toBe("jpamb/cases/Simple.divide:(II)I:1");
    });

    test('Arguments bind to the first slots', () => {
      const frame = Frame.forMethod(target, [intValue(10), intValue(0)]);
      expect(frame.load(0)).toEqual(intValue(10));
      expect(frame.load(1)).toEqual(intValue(0));
      expect(frame.toString()).toBe("<{0:10, 1:0}, ϵ, jpamb/cases/Simple.divide:(II)I:0>");
    });

    test('Unset slots cannot be read', () => {
      const frame = Frame.forMethod(target, [intValue(10)]);
      expect(() => frame.load(1)).toThrow(UninitializedLocalError);
      expect(() => frame.load(1)).toThrow("Local slot 1 read before write at jpamb/cases/Simple.divide:(II)I:0");
    });
  });

  describe('Heap', () => {
    test('References are handed out from zero upward', () => {
      const heap = new Heap();
      expect(heap.allocate({ kind: "array", elementType: "int", elements: [] })).toBe(0);
      expect(heap.allocate({ kind: "object", className: "A", fields: new Map() })).toBe(1);
      expect(heap.size).toBe(2);
      expect(heap.toString()).toBe("@0=[I:], @1=A{}");
    });

    test('Entries are checked for their kind', () => {
      const heap = new Heap();
      const ref = heap.allocate({ kind: "array", elementType: "int", elements: [] });
      expect(() => heap.getObject(ref, "here")).toThrow(TypeAssertionError);
      expect(() => heap.getArray(5, "here")).toThrow("Dangling heap reference @5");
    });

    test('Replace keeps the key', () => {
      const heap = new Heap();
      const ref = heap.allocate({ kind: "array", elementType: "int", elements: [intValue(0)] });
      heap.replace(ref, { kind: "array", elementType: "int", elements: [intValue(3)] });
      expect(heap.getArray(ref, "here").elements).toEqual([intValue(3)]);
      expect(heap.size).toBe(1);
      expect(() => heap.replace(4, { kind: "array", elementType: "int", elements: [] })).toThrow(MalformedBytecodeError);
    });
  });

  describe('State', () => {
    test('Top is the innermost frame', () => {
      const state = new State();
      const outer = Frame.forMethod(method("outer"));
      const inner = Frame.forMethod(method("inner"), [reference(0)]);
      state.pushFrame(outer);
      state.pushFrame(inner);
      expect(state.top).toBe(inner);
      expect(state.depth).toBe(2);
      expect(state.popFrame()).toBe(inner);
      expect(state.top).toBe(outer);
    });

    test('Empty call stack', () => {
      const state = new State();
      expect(() => state.top).toThrow(MalformedBytecodeError);
      expect(() => state.popFrame()).toThrow(MalformedBytecodeError);
    });
  });
});
