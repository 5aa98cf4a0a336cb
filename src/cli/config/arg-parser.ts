import { Command, InvalidArgumentError } from "commander";
import { readFileSync } from "node:fs";
import {
  COMPILE_TARGETS,
  DEFAULT_OUTPUT_DIRECTORY,
  DEFAULT_TIMEOUT_MS,
  EMIT_FORMS,
  OPTIMIZATION_MODES,
  type CompileTarget,
  type EmitForm,
} from "../../pipeline.js";
import type { OptimizationMode } from "../../emitter/index.js";
import type { KindredConfig } from "./types.js";

const DEFAULT_SOURCE = "main.kin";

const readVersion = (): string => {
  const pkg: unknown = JSON.parse(
    readFileSync(new URL("../../../package.json", import.meta.url), "utf8")
  );
  return typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";
};

const choiceParser =
  <T extends string>(label: string, choices: readonly T[]) =>
  (value: string): T => {
    const normalized = value.toLowerCase();
    const match = choices.find((choice) => choice === normalized);
    if (match) {
      return match;
    }
    throw new InvalidArgumentError(
      `invalid ${label} "${value}" (allowed: ${choices.join(", ")})`
    );
  };

const parseMode = choiceParser<OptimizationMode>("mode", OPTIMIZATION_MODES);
const parseTarget = choiceParser<CompileTarget>("target", COMPILE_TARGETS);
const parseEmitForm = choiceParser<EmitForm>("emit form", EMIT_FORMS);

const parseTimeout = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`invalid timeout "${value}" (expected milliseconds)`);
  }
  return parsed;
};

type MakeOptions = {
  mode: OptimizationMode;
  outDir: string;
  target: CompileTarget;
  cc?: string;
  timeout: number;
  emit?: EmitForm;
  color: boolean;
};

type CleanOptions = {
  outDir: string;
};

const createBaseCommand = ({
  name,
  description,
}: {
  name: string;
  description: string;
}): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(readVersion(), "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command");

export const getConfigFromCli = (): KindredConfig => {
  const args = process.argv.slice(2);
  const parsed: { config?: KindredConfig } = {};

  const program = createBaseCommand({
    name: "kindred",
    description: "Kindred ahead-of-time compiler",
  });

  program
    .command("make")
    .description("compile a kindred source file")
    .argument("[source]", `source file (default: ${DEFAULT_SOURCE})`)
    .option("-m, --mode <mode>", "debug | release", parseMode, "release")
    .option(
      "-o, --out-dir <dir>",
      "build directory",
      DEFAULT_OUTPUT_DIRECTORY
    )
    .option("-t, --target <target>", "native | wasm", parseTarget, "native")
    .option("--cc <path>", "C compiler driver used to assemble and link")
    .option(
      "--timeout <ms>",
      "toolchain timeout in milliseconds",
      parseTimeout,
      DEFAULT_TIMEOUT_MS
    )
    .option(
      "--emit <form>",
      `print an intermediate form instead of building (${EMIT_FORMS.join("|")})`,
      parseEmitForm
    )
    .option("--no-color", "disable colored diagnostics")
    .action((source: string | undefined, options: MakeOptions) => {
      parsed.config = {
        command: "make",
        source: source ?? DEFAULT_SOURCE,
        mode: options.mode,
        outDir: options.outDir,
        target: options.target,
        cc: options.cc,
        timeoutMs: options.timeout,
        emit: options.emit,
        color: options.color,
      };
    });

  program
    .command("clean")
    .description("remove the build directory")
    .option(
      "-o, --out-dir <dir>",
      "build directory",
      DEFAULT_OUTPUT_DIRECTORY
    )
    .action((options: CleanOptions) => {
      parsed.config = { command: "clean", outDir: options.outDir };
    });

  program.parse(["node", "kindred", ...args]);

  if (!parsed.config) {
    throw new Error("no command given (expected `make` or `clean`)");
  }
  return parsed.config;
};
