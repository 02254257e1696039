#!/usr/bin/env node
import { existsSync, mkdirSync, readFileSync, realpathSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { config, defaultOutdir } from "./config.js";
import { ConfigError, InputError } from "./errors.js";
import { processWorkbookFromBuffer } from "./index.js";
import { writeMatrices } from "./matrix.js";
import { createLogger, printGreen, printRed, printYellow, setLogFile, setLogLevel } from "./logger.js";
import { parseRulesJson } from "./ruleset.js";
import { writeSheetOutputs } from "./writer.js";
import type { SheetOutcome } from "./types.js";

const log = createLogger("cli");

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_SCHEMA_REJECTED = 2;
export const EXIT_DIAGNOSTICS = 3;

const USAGE =
  "Usage: phenotype-import --infile <workbook> [--sheet <name>]... [--config <rules.json>] [--outdir <dir>] [--logfile <file>] [--verbose]";

const CLI_OPTIONS = {
  infile: { type: "string" },
  sheet: { type: "string", multiple: true },
  config: { type: "string" },
  outdir: { type: "string" },
  logfile: { type: "string" },
  verbose: { type: "boolean", default: false },
} as const;

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, options: CLI_OPTIONS, allowPositionals: false }).values;
}

/** Schema rejection outranks row diagnostics, which outrank a clean run. */
export function exitCodeFor(outcomes: readonly SheetOutcome[]): number {
  if (outcomes.some((o) => o.status === "rejected")) return EXIT_SCHEMA_REJECTED;
  if (outcomes.some((o) => o.status === "processed" && o.result.diagnostics.length > 0)) return EXIT_DIAGNOSTICS;
  return EXIT_OK;
}

function readBytes(file: string): ArrayBuffer {
  const buf = readFileSync(file);
  const bytes = new ArrayBuffer(buf.byteLength);
  new Uint8Array(bytes).set(buf);
  return bytes;
}

/**
 * Run the command line and return the process exit status.
 * Nothing here calls `process.exit`; the entry guard below does.
 */
export function runCli(argv: string[]): number {
  const startTime = performance.now();

  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    printRed(err instanceof Error ? err.message : String(err));
    printRed(USAGE);
    return EXIT_FATAL;
  }

  const infile = args.infile;
  if (!infile) {
    printRed("--infile was not specified");
    printRed(USAGE);
    return EXIT_FATAL;
  }

  setLogLevel(args.verbose ? "debug" : config.LOG_LEVEL);

  let configFile = args.config;
  if (!configFile) {
    configFile = config.RULES_FILE;
    printYellow(`--config was not specified and therefore was set to '${configFile}'`);
  }

  let outdir = args.outdir;
  if (!outdir) {
    outdir = defaultOutdir();
    printYellow(`--outdir was not specified and therefore was set to '${outdir}'`);
  }
  if (!existsSync(outdir)) {
    mkdirSync(outdir, { recursive: true });
    printYellow(`Created output directory '${outdir}'`);
  }

  let logfile = args.logfile;
  if (!logfile) {
    logfile = path.join(outdir, config.LOG_FILE_NAME);
    printYellow(`--logfile was not specified and therefore was set to '${logfile}'`);
  }
  setLogFile(logfile);

  try {
    if (!existsSync(infile)) {
      printRed(`'${infile}' is not a file`);
      log.error(`'${infile}' is not a file`);
      return EXIT_FATAL;
    }
    log.info(`The input file is '${infile}'`);
    log.info(`Loading configuration from '${configFile}'`);

    const rules = parseRulesJson(readFileSync(configFile, "utf8"));
    const outcomes = processWorkbookFromBuffer(readBytes(infile), path.basename(infile), rules, { sheets: args.sheet });

    for (const outcome of outcomes) {
      if (outcome.status === "rejected") {
        printRed(`Rejected worksheet '${outcome.sheet}': ${outcome.error.message}`);
        continue;
      }
      const { cleanFile, diagnosticsFile } = writeSheetOutputs(outcome.result, outdir);
      if (diagnosticsFile) {
        printYellow(
          `Worksheet '${outcome.sheet}': ${outcome.result.diagnostics.length} diagnostics written to '${diagnosticsFile}'`
        );
      }
      console.log(`Processed ${outcome.result.rows.length} rows in worksheet '${outcome.sheet}' -> '${cleanFile}'`);
      const matrices = writeMatrices(outcome.result, outcome.ruleSet, outdir);
      if (matrices) {
        console.log(`Matrices for worksheet '${outcome.sheet}' -> '${matrices.binaryFile}', '${matrices.quantitativeFile}'`);
      }
    }

    const status = exitCodeFor(outcomes);
    if (status === EXIT_OK) printGreen("Execution completed");
    console.log(`Total run time was ${((performance.now() - startTime) / 1000).toFixed(3)} seconds`);
    return status;
  } catch (err) {
    const message =
      err instanceof ConfigError || err instanceof InputError
        ? err.message
        : `Run failed: ${err instanceof Error ? err.message : String(err)}`;
    printRed(message);
    log.error(message);
    return EXIT_FATAL;
  } finally {
    setLogFile(undefined);
  }
}

const isEntry = (() => {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
})();

if (isEntry) {
  process.exitCode = runCli(process.argv.slice(2));
}
