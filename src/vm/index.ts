// Runtime structures
export { OperandStack } from "./operand-stack";
export { Frame, ProgramCounter, programCounter, advance, jumpTo, formatPc } from "./frame";
export { Heap } from "./heap";
export { State } from "./state";

// Program image
export { InstructionStore } from "./instruction-store";

// Transition function and driver
export { step, StepResult, applyBinary, compare, ASSERTION_ERROR_CLASS } from "./step";
export { Interpreter, InterpreterOptions, RunResult, DEFAULT_MAX_STEPS } from "./interpreter";

// Outcomes and defects
export { Outcome, NON_TERMINATION, RunOutcome } from "./outcome";
export {
  InterpreterError,
  UnsupportedInstructionError,
  MalformedBytecodeError,
  UninitializedLocalError,
  TypeAssertionError,
  SuiteError,
  InputParseError,
} from "./errors";
