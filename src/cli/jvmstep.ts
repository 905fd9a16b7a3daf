#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { DEFAULT_SUITE_DIR, disassembleMethod, runCase } from "../runner/runCase";
import { InterpreterError } from "../vm/errors";
import { DEFAULT_MAX_STEPS } from "../vm/interpreter";

export const INFO_LINES = [
  "jvmstep",
  "1.0.0",
  "jvm-stepper",
  "dynamic,interpreter,typescript",
  "no",
];

interface SuiteFlags {
  suite?: string;
  maxSteps?: number;
  debug?: boolean;
}

function parseBudget(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return n;
}

function suiteDir(flags: SuiteFlags): string {
  return flags.suite ?? process.env.JVMSTEP_SUITE ?? DEFAULT_SUITE_DIR;
}

function reportFailure(error: unknown): never {
  if (error instanceof InterpreterError) {
    console.error(`${error.name}: ${error.message}`);
  } else {
    console.error("Error interpreting method:", error);
    if (error instanceof Error) {
      console.error("Stack trace:", error.stack);
    }
  }
  process.exit(1);
}

/**
 * CLI tool for running methods of a decompiled program suite
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("jvmstep")
    .description("Concrete bytecode interpreter - run a method and report its outcome")
    .version("1.0.0");

  program
    .command("interpret")
    .description("Run a method on concrete inputs and print its outcome")
    .argument("<method>", "method identifier, e.g. jpamb.cases.Simple.divide:(II)I")
    .argument("[inputs]", "argument literal, e.g. (10, 0)", "()")
    .option("-s, --suite <dir>", "directory of decompiled class files")
    .option("-n, --max-steps <n>", `step budget (default: ${DEFAULT_MAX_STEPS})`, parseBudget)
    .option("--debug", "trace every step on stderr")
    .action((method: string, inputs: string, flags: SuiteFlags) => {
      try {
        const result = runCase(method, inputs, {
          suiteDir: suiteDir(flags),
          maxSteps: flags.maxSteps,
          debug: flags.debug,
        });
        console.log(result.outcome);
      } catch (error) {
        reportFailure(error);
      }
    });

  program
    .command("disassemble")
    .description("Print the decoded instructions of a method")
    .argument("<method>", "method identifier")
    .option("-s, --suite <dir>", "directory of decompiled class files")
    .action((method: string, flags: SuiteFlags) => {
      try {
        for (const line of disassembleMethod(method, { suiteDir: suiteDir(flags) })) {
          console.log(line);
        }
      } catch (error) {
        reportFailure(error);
      }
    });

  program
    .command("info")
    .description("Print analyzer information")
    .action(() => {
      for (const line of INFO_LINES) {
        console.log(line);
      }
    });

  return program;
}

// Run the CLI if this file is executed directly
if (require.main === module) {
  createProgram().parse(process.argv);
}
