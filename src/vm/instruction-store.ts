import { Instruction } from "../jvm/instructions";
import { FieldRef, MethodId, formatFieldRef, formatMethodId } from "../jvm/method-id";
import { StackValue, defaultValue, isPrimitiveType, primitiveValue } from "../jvm/types";
import { ClassInfo, Suite } from "../suite/suite";
import { MalformedBytecodeError, SuiteError } from "./errors";
import { ProgramCounter, formatPc } from "./frame";

/**
 * Per-run cache over the suite. Method bodies and class metadata are
 * fetched on first reference and kept for the rest of the run; the program
 * image is assumed immutable, so nothing is ever invalidated.
 */
export class InstructionStore {
  private readonly suite: Suite;
  private methods = new Map<string, Instruction[]>();
  private classes = new Map<string, ClassInfo>();

  constructor(suite: Suite) {
    this.suite = suite;
  }

  get(method: MethodId): readonly Instruction[] {
    const key = formatMethodId(method);
    let code = this.methods.get(key);
    if (code === undefined) {
      code = this.suite.methodOpcodes(method);
      this.methods.set(key, code);
    }
    return code;
  }

  at(pc: ProgramCounter): Instruction {
    const code = this.get(pc.method);
    const instr = code[pc.offset];
    if (instr === undefined) {
      throw new MalformedBytecodeError(`PC ${formatPc(pc)} out of bounds (method has ${code.length} instructions)`);
    }
    return instr;
  }

  findClass(className: string): ClassInfo {
    let info = this.classes.get(className);
    if (info === undefined) {
      info = this.suite.findClass(className);
      this.classes.set(className, info);
    }
    return info;
  }

  /**
   * Declared value of a static field, or the zero value of its type when
   * the class file carries none.
   */
  staticValue(field: FieldRef): StackValue {
    const declared = this.findClass(field.className).fields.find(f => f.static && f.name === field.name);
    if (declared === undefined) {
      throw new SuiteError(`Static field not found: ${formatFieldRef(field)}`);
    }
    if (declared.value === undefined || declared.value === null) {
      return defaultValue(declared.type);
    }
    if (!isPrimitiveType(declared.type)) {
      throw new SuiteError(`Cannot materialize constant of ${formatFieldRef(field)}`);
    }
    return primitiveValue(declared.type, declared.value);
  }

  get cachedMethodCount(): number {
    return this.methods.size;
  }
}
