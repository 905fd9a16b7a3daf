import { StackValue } from "../jvm/types";
import { MalformedBytecodeError } from "./errors";
import { Frame } from "./frame";
import { Heap } from "./heap";

/**
 * Heap plus call stack (innermost frame last). Static fields written
 * during the run shadow the values declared in class files.
 */
export class State {
  readonly heap: Heap;
  readonly frames: Frame[];
  readonly statics: Map<string, StackValue>;

  constructor(heap: Heap = new Heap(), frames: Frame[] = [], statics: Map<string, StackValue> = new Map()) {
    this.heap = heap;
    this.frames = frames;
    this.statics = statics;
  }

  get top(): Frame {
    const frame = this.frames[this.frames.length - 1];
    if (frame === undefined) {
      throw new MalformedBytecodeError("Call stack is empty");
    }
    return frame;
  }

  get depth(): number {
    return this.frames.length;
  }

  pushFrame(frame: Frame): void {
    this.frames.push(frame);
  }

  popFrame(): Frame {
    const frame = this.frames.pop();
    if (frame === undefined) {
      throw new MalformedBytecodeError("Return with an empty call stack");
    }
    return frame;
  }
}
