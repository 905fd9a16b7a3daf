import { Instruction } from "../jvm/instructions";
import { MethodId } from "../jvm/method-id";
import { JvmType } from "../jvm/types";

export type ConstantValue = number | boolean | string | null;

export interface FieldInfo {
  name: string;
  type: JvmType;
  static: boolean;
  /** Initial value of a static field, when the class file carries one. */
  value?: ConstantValue;
}

export interface ClassInfo {
  name: string;
  fields: FieldInfo[];
}

/**
 * The program image a run executes: decoded method bodies and class
 * metadata.
 */
export interface Suite {
  methodOpcodes(method: MethodId): Instruction[];
  findClass(className: string): ClassInfo;
}
