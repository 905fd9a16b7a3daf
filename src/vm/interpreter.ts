import { formatInstruction } from "../jvm/instructions";
import { MethodId, formatMethodId } from "../jvm/method-id";
import { InputValue, StackValue, formatValue, intValue, reference } from "../jvm/types";
import { Suite } from "../suite/suite";
import { Frame, formatPc } from "./frame";
import { InstructionStore } from "./instruction-store";
import { NON_TERMINATION, RunOutcome } from "./outcome";
import { State } from "./state";
import { step } from "./step";

export interface InterpreterOptions {
  maxSteps?: number;
  debug?: boolean;
}

export const DEFAULT_MAX_STEPS = 100000;

export interface RunResult {
  outcome: RunOutcome;
  steps: number;
  /** Value returned by the entry method, when it returned one. */
  returned: StackValue | null;
}

/**
 * Execution driver: builds the initial state and applies the transition
 * function until it halts or the step budget runs out.
 */
export class Interpreter {
  private suite: Suite;

  // Step budget
  private maxSteps: number = DEFAULT_MAX_STEPS;

  // Statistics of the latest run
  private stepCount: number = 0;
  private callDepth: number = 0;
  private maxCallDepth: number = 0;
  private heapSize: number = 0;

  private debugMode: boolean = false;

  constructor(suite: Suite, options?: InterpreterOptions) {
    this.suite = suite;

    if (options) {
      if (options.maxSteps !== undefined) this.maxSteps = options.maxSteps;
      if (options.debug !== undefined) this.debugMode = options.debug;
    }
  }

  /**
   * Debug logging helper. Traces go to stderr; stdout carries the outcome.
   */
  private debug(message: string): void {
    if (this.debugMode) {
      console.error(`[DEBUG] ${message}`);
    }
  }

  /**
   * Binds each input to local slot 0..k-1 of a fresh frame. Booleans widen
   * to 0/1 ints; arrays are materialized into the heap and passed by
   * reference.
   */
  initialState(method: MethodId, inputs: readonly InputValue[]): State {
    const state = new State();
    const args = inputs.map((input): StackValue => {
      switch (input.kind) {
        case "boolean":
          return intValue(input.value ? 1 : 0);
        case "array":
          return reference(state.heap.allocate({ ...input, elements: [...input.elements] }));
        default:
          return input;
      }
    });
    state.pushFrame(Frame.forMethod(method, args));
    this.debug(`Initial frame ${state.top.toString()}`);
    return state;
  }

  run(method: MethodId, inputs: readonly InputValue[] = []): RunResult {
    return this.execute(this.initialState(method, inputs));
  }

  /**
   * Drives a prepared state. Each run gets its own instruction store, so
   * nothing is shared between runs.
   */
  execute(initial: State): RunResult {
    const store = new InstructionStore(this.suite);
    let state = initial;

    this.stepCount = 0;
    this.callDepth = state.depth;
    this.maxCallDepth = state.depth;
    this.heapSize = state.heap.size;

    while (this.stepCount < this.maxSteps) {
      if (this.debugMode) {
        const frame = state.top;
        const stack = frame.stack.toArray().map(formatValue).join(", ");
        this.debug(`PC=${formatPc(frame.pc)} | ${formatInstruction(store.at(frame.pc))} | Stack: [${stack}]`);
      }

      const result = step(state, store);
      this.stepCount++;

      if (result.done) {
        this.callDepth = state.depth;
        this.debug(`Halted with '${result.outcome}' after ${this.stepCount} steps`);
        return { outcome: result.outcome, steps: this.stepCount, returned: result.returned };
      }

      state = result.state;
      this.observe(state);
    }

    this.debug(`Step budget of ${this.maxSteps} exhausted`);
    return { outcome: NON_TERMINATION, steps: this.stepCount, returned: null };
  }

  private observe(state: State): void {
    if (state.depth !== this.callDepth) {
      const verb = state.depth > this.callDepth ? "Entered" : "Returned to";
      this.debug(`${verb} ${formatMethodId(state.top.pc.method)} (depth ${state.depth})`);
      this.callDepth = state.depth;
      this.maxCallDepth = Math.max(this.maxCallDepth, state.depth);
    }
    if (state.heap.size !== this.heapSize) {
      this.debug(`Heap: ${state.heap.toString()}`);
      this.heapSize = state.heap.size;
    }
  }

  /**
   * Get execution statistics of the latest run
   */
  getStats(): {
    steps: number;
    callDepth: number;
    maxCallDepth: number;
    heapSize: number;
  } {
    return {
      steps: this.stepCount,
      callDepth: this.callDepth,
      maxCallDepth: this.maxCallDepth,
      heapSize: this.heapSize,
    };
  }
}
