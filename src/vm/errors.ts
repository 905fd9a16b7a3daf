/**
 * Implementation defects: conditions where the interpreter itself, not the
 * program under analysis, is at fault. These abort a run and never produce
 * an outcome token.
 */
export class InterpreterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InterpreterError";
  }
}

export class UnsupportedInstructionError extends InterpreterError {
  constructor(description: string) {
    super(`Unsupported instruction: ${description}`);
    this.name = "UnsupportedInstructionError";
  }
}

export class MalformedBytecodeError extends InterpreterError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedBytecodeError";
  }
}

export class UninitializedLocalError extends InterpreterError {
  constructor(slot: number, where: string) {
    super(`Local slot ${slot} read before write at ${where}`);
    this.name = "UninitializedLocalError";
  }
}

export class TypeAssertionError extends InterpreterError {
  constructor(expected: string, actual: string, where: string) {
    super(`TypeError: expected ${expected} but got ${actual} at ${where}`);
    this.name = "TypeAssertionError";
  }
}

export class SuiteError extends InterpreterError {
  constructor(message: string) {
    super(message);
    this.name = "SuiteError";
  }
}

export class InputParseError extends InterpreterError {
  constructor(message: string) {
    super(message);
    this.name = "InputParseError";
  }
}
