import { Instruction } from "../jvm/instructions";
import { MethodId, formatMethodId, methodDescriptor } from "../jvm/method-id";
import { SuiteError } from "../vm/errors";
import { ClassInfo, FieldInfo, Suite } from "./suite";

interface MemoryClass {
  fields: FieldInfo[];
  methods: Map<string, Instruction[]>;
}

function methodKey(name: string, method: Pick<MethodId, "params" | "returns">): string {
  return `${name}:${methodDescriptor(method)}`;
}

/**
 * Suite whose classes are registered programmatically.
 */
export class MemorySuite implements Suite {
  private classes = new Map<string, MemoryClass>();

  addClass(name: string, fields: FieldInfo[] = []): this {
    const existing = this.classes.get(name);
    if (existing) {
      existing.fields.push(...fields);
    } else {
      this.classes.set(name, { fields: [...fields], methods: new Map() });
    }
    return this;
  }

  addMethod(method: MethodId, code: Instruction[]): this {
    this.addClass(method.className);
    this.requireClass(method.className).methods.set(methodKey(method.name, method), [...code]);
    return this;
  }

  methodOpcodes(method: MethodId): Instruction[] {
    const code = this.requireClass(method.className).methods.get(methodKey(method.name, method));
    if (code === undefined) {
      throw new SuiteError(`Method not found: ${formatMethodId(method)}`);
    }
    return [...code];
  }

  findClass(className: string): ClassInfo {
    return { name: className, fields: [...this.requireClass(className).fields] };
  }

  private requireClass(className: string): MemoryClass {
    const found = this.classes.get(className);
    if (found === undefined) {
      throw new SuiteError(`Class not found: ${className}`);
    }
    return found;
  }
}
