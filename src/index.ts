export * from "./vm";
export * from "./jvm/types";
export * from "./jvm/instructions";
export * from "./jvm/method-id";
export { decodeInstruction, decodeInstructions, decodeType } from "./jvm/decode";
export { parseInputs, checkInputs } from "./jvm/inputs";
export { Suite, ClassInfo, FieldInfo, ConstantValue } from "./suite/suite";
export { MemorySuite } from "./suite/memory-suite";
export { DecompiledSuite } from "./suite/decompiled-suite";
export { runCase, disassembleMethod, CaseOptions, DEFAULT_SUITE_DIR } from "./runner/runCase";
