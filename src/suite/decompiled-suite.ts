import * as fs from "fs";
import * as path from "path";
import {
  JsonRecord,
  decodeInstructions,
  decodeReturnType,
  decodeType,
  requireArray,
  requireRecord,
  requireString,
} from "../jvm/decode";
import { Instruction } from "../jvm/instructions";
import { MethodId, formatMethodId, methodDescriptor } from "../jvm/method-id";
import { SuiteError } from "../vm/errors";
import { ClassInfo, ConstantValue, FieldInfo, Suite } from "./suite";

interface ClassFile {
  info: ClassInfo;
  methods: JsonRecord[];
}

function decodeConstantValue(json: unknown, where: string): ConstantValue | undefined {
  if (json === undefined || json === null) {
    return undefined;
  }
  if (typeof json === "number" || typeof json === "boolean" || typeof json === "string") {
    return json;
  }
  throw new SuiteError(`Unsupported constant ${JSON.stringify(json)} for ${where}`);
}

function decodeField(json: unknown, className: string): FieldInfo {
  const record = requireRecord(json, "field");
  const name = requireString(record, "name");
  const value = decodeConstantValue(record.value, `${className}.${name}`);
  const field: FieldInfo = { name, type: decodeType(record.type), static: record.static === true };
  if (value !== undefined) {
    field.value = value;
  }
  return field;
}

/**
 * Reads decompiled class files (`<dir>/<internal/class/Name>.json`).
 * Each class file is parsed once per suite; method signatures and bodies
 * are decoded on request, so a class may carry methods the interpreter
 * cannot run as long as nothing calls them.
 */
export class DecompiledSuite implements Suite {
  private readonly root: string;
  private classes = new Map<string, ClassFile>();

  constructor(root: string) {
    this.root = root;
  }

  classFilePath(className: string): string {
    return path.join(this.root, ...className.split("/")) + ".json";
  }

  methodOpcodes(method: MethodId): Instruction[] {
    const wanted = methodDescriptor(method);
    const record = this.load(method.className).methods.find(
      candidate =>
        candidate.name === method.name &&
        requireArray(candidate, "params").length === method.params.length &&
        methodDescriptor({
          params: requireArray(candidate, "params").map(decodeType),
          returns: decodeReturnType(candidate.returns),
        }) === wanted
    );
    if (record === undefined) {
      throw new SuiteError(`Method not found: ${formatMethodId(method)}`);
    }
    const code = record.code;
    // Accept both a bare instruction list and the nested { bytecode: [...] } form.
    const instructions = Array.isArray(code) ? code : requireArray(requireRecord(code, "code"), "bytecode");
    return decodeInstructions(instructions);
  }

  findClass(className: string): ClassInfo {
    return this.load(className).info;
  }

  private load(className: string): ClassFile {
    const cached = this.classes.get(className);
    if (cached) {
      return cached;
    }

    const file = this.classFilePath(className);
    if (!fs.existsSync(file)) {
      throw new SuiteError(`Class not found: ${className} (looked for '${file}')`);
    }

    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(file, "utf8"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SuiteError(`Cannot read class file '${file}': ${reason}`);
    }

    const record = requireRecord(json, "class file");
    const name = typeof record.name === "string" ? record.name : className;
    const fields = record.fields === undefined ? [] : requireArray(record, "fields").map(f => decodeField(f, name));

    const methods = (record.methods === undefined ? [] : requireArray(record, "methods")).map(entry =>
      requireRecord(entry, "method")
    );

    const classFile: ClassFile = { info: { name, fields }, methods };
    this.classes.set(className, classFile);
    return classFile;
  }
}
