import { decodeInstruction, decodeInstructions, decodeType } from "../jvm/decode";
import { formatInstruction } from "../jvm/instructions";
import { NULL_REFERENCE, booleanValue, charValue, intValue } from "../jvm/types";
import { MalformedBytecodeError, UnsupportedInstructionError } from "../vm/errors";

describe('Instruction decoding', () => {
  describe('Constants', () => {
    test('Integer constants', () => {
      expect(decodeInstruction({ opr: "push", value: { type: "integer", value: 5 } })).toEqual({
        opr: "push",
        value: intValue(5),
      });
    });

    test('Null constant', () => {
      expect(decodeInstruction({ opr: "push", value: null })).toEqual({ opr: "push", value: NULL_REFERENCE });
    });

    test('Boolean and char constants', () => {
      expect(decodeInstruction({ opr: "push", value: { type: "boolean", value: true } })).toEqual({
        opr: "push",
        value: booleanValue(true),
      });
      expect(decodeInstruction({ opr: "push", value: { type: "char", value: "a" } })).toEqual({
        opr: "push",
        value: charValue(97),
      });
    });

    test('Floating point constants are rejected', () => {
      expect(() => decodeInstruction({ opr: "push", value: { type: "float", value: 1.5 } })).toThrow(
        UnsupportedInstructionError
      );
    });
  });

  describe('Types', () => {
    test('Nested array and class types', () => {
      expect(decodeType({ kind: "array", type: { kind: "class", name: "java/lang/String" } })).toEqual({
        kind: "array",
        type: { kind: "class", name: "java/lang/String" },
      });
    });

    test('Sub-int locals are loaded as int', () => {
      expect(decodeInstruction({ opr: "load", type: "boolean", index: 2 })).toEqual({
        opr: "load",
        type: "int",
        index: 2,
      });
    });

    test('Object arrays given as ref', () => {
      expect(decodeInstruction({ opr: "newarray", type: "ref", dim: 1 })).toEqual({
        opr: "newarray",
        type: { kind: "class", name: "java/lang/Object" },
      });
    });

    test('Base form used for field types', () => {
      expect(decodeType({ base: "int" })).toEqual("int");
      expect(decodeType({ base: "boolean" })).toEqual("boolean");
      expect(() => decodeType({ base: "double" })).toThrow("Unsupported instruction: operand type \"double\"");
    });

    test('Unknown type encoding is malformed', () => {
      expect(() => decodeType({ kind: "union" })).toThrow(MalformedBytecodeError);
    });
  });

  describe('Listing', () => {
    test('Decoded instructions format one per line', () => {
      const code = decodeInstructions([
        { opr: "get", static: true, field: { class: "jpamb/cases/Simple", name: "$assertionsDisabled", type: "boolean" } },
        { opr: "ifz", condition: "ne", target: 7 },
        { opr: "incr", index: 1, amount: -1 },
        { opr: "invoke", access: "static", method: { class: "jpamb/cases/Simple", name: "divide", args: ["int", "int"], returns: "int" } },
        { opr: "array_store", type: "char" },
        { opr: "cast", from: "int", to: "short" },
        { opr: "return", type: null },
      ]);
      expect(code.map(formatInstruction)).toEqual([
        "get static jpamb/cases/Simple.$assertionsDisabled:Z",
        "ifz ne 7",
        "incr 1 by -1",
        "invoke static jpamb/cases/Simple.divide:(II)I",
        "array_store:char",
        "cast int to short",
        "return",
      ]);
    });
  });

  describe('Rejections', () => {
    test('Unmodelled opcodes', () => {
      expect(() => decodeInstruction({ opr: "throw" })).toThrow(UnsupportedInstructionError);
      expect(() => decodeInstruction({ opr: "binary", type: "float", operant: "add" })).toThrow(
        "Unsupported instruction: operand type \"float\""
      );
    });

    test('Two-word and multi-dimensional forms', () => {
      expect(() => decodeInstruction({ opr: "dup", words: 2 })).toThrow(UnsupportedInstructionError);
      expect(() => decodeInstruction({ opr: "newarray", type: "int", dim: 2 })).toThrow(UnsupportedInstructionError);
    });

    test('Only int narrowing casts', () => {
      expect(() => decodeInstruction({ opr: "cast", from: "int", to: "boolean" })).toThrow(
        "Unsupported instruction: cast int to boolean"
      );
      expect(() => decodeInstruction({ opr: "cast", from: "short", to: "byte" })).toThrow(
        "Unsupported instruction: cast short to byte"
      );
    });

    test('Unknown branch condition', () => {
      expect(() => decodeInstruction({ opr: "if", condition: "between", target: 3 })).toThrow(
        "Unsupported instruction: branch condition \"between\""
      );
    });

    test('Missing fields are malformed', () => {
      expect(() => decodeInstruction({ opr: "load", type: "int" })).toThrow(MalformedBytecodeError);
      expect(() => decodeInstruction("push")).toThrow(MalformedBytecodeError);
    });
  });
});
