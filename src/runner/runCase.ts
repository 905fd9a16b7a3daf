import { checkInputs, parseInputs } from "../jvm/inputs"
import { formatInstruction } from "../jvm/instructions"
import { parseMethodId } from "../jvm/method-id"
import { DecompiledSuite } from "../suite/decompiled-suite"
import { Suite } from "../suite/suite"
import { Interpreter, InterpreterOptions, RunResult } from "../vm/interpreter"

export const DEFAULT_SUITE_DIR = "decompiled"

export interface CaseOptions extends InterpreterOptions {
    /** Program image to run against; defaults to the decompiled files under `suiteDir`. */
    suite?: Suite,
    suiteDir?: string
}

function resolveSuite(options: CaseOptions): Suite {
    return options.suite ?? new DecompiledSuite(options.suiteDir ?? DEFAULT_SUITE_DIR)
}

/**
 * Runs one case: `jpamb.cases.Simple.divide:(II)I` with `(10, 0)`.
 */
export function runCase(
    methodText: string,
    inputText: string = "()",
    options: CaseOptions = {}
): RunResult {
    const method = parseMethodId(methodText)
    const inputs = parseInputs(inputText)
    checkInputs(method, inputs)

    const interpreter = new Interpreter(resolveSuite(options), options)
    return interpreter.run(method, inputs)
}

/**
 * Instruction listing of a method, one `NNN | instruction` line each.
 */
export function disassembleMethod(methodText: string, options: CaseOptions = {}): string[] {
    const method = parseMethodId(methodText)
    return resolveSuite(options)
        .methodOpcodes(method)
        .map((instr, offset) => `${String(offset).padStart(3, "0")} | ${formatInstruction(instr)}`)
}
