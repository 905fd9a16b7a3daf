import {
  NULL_REFERENCE,
  booleanValue,
  byteValue,
  charValue,
  defaultValue,
  formatValue,
  intValue,
  primitiveValue,
  reference,
  shortValue,
  typeDescriptor,
  typesEqual,
  valuesEqual,
} from "../jvm/types";

describe('Values and types', () => {
  test('Constructors normalize to their width', () => {
    expect(intValue(2147483648)).toEqual({ kind: "int", value: -2147483648 });
    expect(shortValue(32768)).toEqual({ kind: "short", value: -32768 });
    expect(byteValue(255)).toEqual({ kind: "byte", value: -1 });
    expect(charValue("A")).toEqual({ kind: "char", value: 65 });
    expect(charValue(-1)).toEqual({ kind: "char", value: 65535 });
  });

  test('Equality compares kind and payload', () => {
    expect(valuesEqual(intValue(1), intValue(1))).toBe(true);
    expect(valuesEqual(intValue(1), booleanValue(true))).toBe(false);
    expect(valuesEqual(intValue(97), charValue("a"))).toBe(false);
    expect(valuesEqual(reference(2), reference(2))).toBe(true);
    expect(valuesEqual(NULL_REFERENCE, reference(0))).toBe(false);
    expect(
      valuesEqual(
        { kind: "array", elementType: "int", elements: [intValue(1)] },
        { kind: "array", elementType: "int", elements: [intValue(1)] }
      )
    ).toBe(true);
    expect(
      valuesEqual(
        { kind: "object", className: "A", fields: new Map([["x", intValue(1)]]) },
        { kind: "object", className: "A", fields: new Map([["x", intValue(2)]]) }
      )
    ).toBe(false);
  });

  test('Default values', () => {
    expect(defaultValue("int")).toEqual(intValue(0));
    expect(defaultValue("boolean")).toEqual(booleanValue(false));
    expect(defaultValue("char")).toEqual(charValue(0));
    expect(defaultValue({ kind: "array", type: "int" })).toEqual(NULL_REFERENCE);
  });

  test('Raw constants', () => {
    expect(primitiveValue("boolean", 1)).toEqual(booleanValue(true));
    expect(primitiveValue("char", "z")).toEqual(charValue(122));
    expect(primitiveValue("int", false)).toEqual(intValue(0));
  });

  test('Descriptors and structural type equality', () => {
    expect(typeDescriptor({ kind: "array", type: { kind: "class", name: "java/lang/String" } })).toBe(
      "[Ljava/lang/String;"
    );
    expect(typesEqual({ kind: "array", type: "int" }, { kind: "array", type: "int" })).toBe(true);
    expect(typesEqual({ kind: "array", type: "int" }, { kind: "array", type: "char" })).toBe(false);
    expect(typesEqual("int", { kind: "class", name: "int" })).toBe(false);
  });

  test('Formatting', () => {
    expect(formatValue(intValue(-4))).toBe("-4");
    expect(formatValue(charValue("h"))).toBe("'h'");
    expect(formatValue(shortValue(3))).toBe("(short)3");
    expect(formatValue(NULL_REFERENCE)).toBe("null");
    expect(formatValue(reference(3))).toBe("@3");
    expect(formatValue({ kind: "array", elementType: "int", elements: [intValue(1), intValue(2)] })).toBe("[I:1,2]");
    expect(formatValue({ kind: "object", className: "P", fields: new Map([["f", intValue(1)]]) })).toBe("P{f=1}");
  });
});
