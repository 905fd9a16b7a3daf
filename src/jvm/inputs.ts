import { InputParseError } from "../vm/errors";
import { MethodId, formatMethodId } from "./method-id";
import {
  ArrayValue,
  BooleanValue,
  CharValue,
  InputValue,
  IntValue,
  JvmType,
  StackValue,
  booleanValue,
  charValue,
  formatType,
  intValue,
  typesEqual,
} from "./types";

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;

/**
 * Parser for argument literals such as `(10, true, 'a', [I:1,2], [C:'h','i'])`.
 */
class InputParser {
  private readonly text: string;
  private cursor = 0;

  constructor(text: string) {
    this.text = text;
  }

  parse(): InputValue[] {
    this.expect("(");
    const values: InputValue[] = [];
    if (!this.accept(")")) {
      do {
        values.push(this.value());
      } while (this.accept(","));
      this.expect(")");
    }
    this.skipSpace();
    if (this.cursor !== this.text.length) {
      this.fail("trailing characters");
    }
    return values;
  }

  private value(): InputValue {
    this.skipSpace();
    const ch = this.text[this.cursor];
    if (ch === "[") {
      return this.array();
    }
    return this.scalar();
  }

  private scalar(): IntValue | BooleanValue | CharValue {
    this.skipSpace();
    if (this.text[this.cursor] === "'") {
      const ch = this.text[this.cursor + 1];
      if (ch === undefined || this.text[this.cursor + 2] !== "'") {
        this.fail("malformed char literal");
      }
      this.cursor += 3;
      return charValue(ch);
    }
    const match = /^(-?\d+|true|false)/.exec(this.text.slice(this.cursor));
    if (match === null) {
      this.fail("expected a value");
    }
    this.cursor += match[0].length;
    if (match[0] === "true" || match[0] === "false") {
      return booleanValue(match[0] === "true");
    }
    const n = Number(match[0]);
    if (n < INT_MIN || n > INT_MAX) {
      this.fail(`${match[0]} does not fit in an int`);
    }
    return intValue(n);
  }

  private array(): ArrayValue {
    this.expect("[");
    const letter = this.text[this.cursor];
    const elementType: "int" | "char" | "boolean" | undefined = letter === "I" ? "int" : letter === "C" ? "char" : letter === "Z" ? "boolean" : undefined;
    if (elementType === undefined) {
      this.fail("array literal must start with I:, C: or Z:");
    }
    this.cursor++;
    this.expect(":");
    const elements: StackValue[] = [];
    if (!this.accept("]")) {
      do {
        const element = this.scalar();
        if (element.kind !== elementType) {
          this.fail(`expected ${elementType} element`);
        }
        elements.push(element);
      } while (this.accept(","));
      this.expect("]");
    }
    return { kind: "array", elementType, elements };
  }

  private skipSpace(): void {
    while (this.cursor < this.text.length && /\s/.test(this.text[this.cursor])) {
      this.cursor++;
    }
  }

  private accept(token: string): boolean {
    this.skipSpace();
    if (this.text.startsWith(token, this.cursor)) {
      this.cursor += token.length;
      return true;
    }
    return false;
  }

  private expect(token: string): void {
    if (!this.accept(token)) {
      this.fail(`expected '${token}'`);
    }
  }

  private fail(reason: string): never {
    throw new InputParseError(`Bad input '${this.text}' at ${this.cursor}: ${reason}`);
  }
}

export function parseInputs(text: string): InputValue[] {
  return new InputParser(text.trim()).parse();
}

function inputType(input: InputValue): JvmType {
  return input.kind === "array" ? { kind: "array", type: input.elementType } : input.kind;
}

/**
 * Checks arity and basic kind of the inputs against the method's parameters.
 */
export function checkInputs(method: MethodId, inputs: readonly InputValue[]): void {
  if (inputs.length !== method.params.length) {
    throw new InputParseError(
      `${formatMethodId(method)} expects ${method.params.length} arguments but got ${inputs.length}`
    );
  }
  method.params.forEach((param, i) => {
    const actual = inputType(inputs[i]);
    if (!typesEqual(param, actual)) {
      throw new InputParseError(
        `Argument ${i} of ${formatMethodId(method)} must be ${formatType(param)}, got ${formatType(actual)}`
      );
    }
  });
}
