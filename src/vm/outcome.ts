/**
 * Terminal classification of a run that finished within its budget.
 */
export enum Outcome {
  Ok = "ok",
  DivideByZero = "divide by zero",
  AssertionError = "assertion error",
  OutOfBounds = "out of bounds",
  NullPointer = "null pointer",
}

/**
 * Budget exhaustion. Says only that the run did not finish in time.
 */
export const NON_TERMINATION = "*";

export type RunOutcome = Outcome | typeof NON_TERMINATION;

