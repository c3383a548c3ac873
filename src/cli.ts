#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { HttpCapability } from "./capabilities/http-capability.js";
import { loadConfigFile, resolveConfig, type StagelineConfig } from "./config.js";
import { RunNotFoundError, errorMessage } from "./errors.js";
import type { TaskGraph } from "./graph/types.js";
import { Replayer } from "./persistence/replayer.js";
import { RunStore } from "./persistence/store.js";
import { Pipeline } from "./pipeline.js";
import { httpCapabilitiesFor, loadPipelineFile } from "./pipelines/loader.js";
import { STOCK_ANALYSIS_PIPELINE_PATH, createStockAnalysisCatalog, defaultRunInput } from "./pipelines/stock-analysis.js";
import { createSyntheticCapability } from "./pipelines/synthetic-capability.js";
import { exitCodeFor, formatReport } from "./run/report.js";
import { serializeTerminalOutput } from "./run/run.js";
import type { RunReport } from "./run/types.js";
import { JsonObjectSchema, parseOrThrow, type PipelineDefinition } from "./schemas.js";
import { isLogLevel, log, setLogLevel } from "./utils/logger.js";
import type { JsonObject } from "./utils/stable-json.js";

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection", { error: errorMessage(reason) });
});

type GlobalOptions = { debug?: boolean; logLevel?: string; config?: string; db?: string };

const program = new Command();

program
  .name("stageline")
  .description("Fault-tolerant pipeline runner with validated stages, fallbacks and replayable run logs")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--log-level <level>", "debug | info | warn | error | silent")
  .option("--config <file>", "JSON config file")
  .option("--db <path>", "Run log database (overrides config)");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals<GlobalOptions>();
  if (opts.logLevel !== undefined) {
    if (!isLogLevel(opts.logLevel)) throw new InvalidArgumentError(`unknown log level "${opts.logLevel}"`);
    setLogLevel(opts.logLevel);
  }
  if (opts.debug) setLogLevel("debug");
});

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("must be a positive integer");
  return n;
}

function loadConfig(opts: GlobalOptions): StagelineConfig {
  const config = opts.config ? loadConfigFile(opts.config) : resolveConfig();
  return opts.db ? { ...config, store: { dbPath: opts.db } } : config;
}

function readJsonObject(path: string): JsonObject {
  return parseOrThrow(JsonObjectSchema, JSON.parse(readFileSync(path, "utf8")), `input file ${path}`);
}

function writeOutput(path: string, text: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, text + "\n");
  log.info(`Terminal output written to ${path}`);
}

function printReport(report: RunReport, truncate: number): void {
  console.error("");
  for (const line of formatReport(report, truncate)) console.error(line);
}

/** Print the report to stderr and the canonical terminal output to stdout. */
function emit(
  report: RunReport,
  config: StagelineConfig,
  out?: string,
  serialized = serializeTerminalOutput(report.terminalOutput),
): void {
  printReport(report, config.limits.outputTruncation);
  console.log(serialized);
  if (out) writeOutput(out, serialized);
  if (exitCodeFor(report) !== 0) process.exitCode = 1;
}

/** Run an action; any error becomes `Error: <message>` and exit code 1. */
function action<A extends unknown[]>(
  fn: (this: Command, ...args: A) => Promise<void> | void,
): (this: Command, ...args: A) => Promise<void> {
  return async function (this: Command, ...args: A) {
    try {
      await fn.apply(this, args);
    } catch (err) {
      console.error("Error:", errorMessage(err));
      process.exitCode = 1;
    }
  };
}

function cancelOnSigint(): AbortController {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    log.warn("Interrupted; cancelling run");
    controller.abort();
  });
  return controller;
}

// --- run ---
program
  .command("run")
  .description("Execute a new run of a pipeline")
  .option("-p, --pipeline <file>", "Pipeline definition (default: built-in stock-analysis)")
  .option("-i, --input <file>", "Run input JSON (default: built-in universe)")
  .option("--run-id <id>", "Run id (default: a fresh UUID)")
  .option("-e, --endpoint <url>", "HTTP capability serving every stage kind without a declared endpoint")
  .option("-o, --out <file>", "Also write the terminal output to a file")
  .option("-c, --concurrency <n>", "Max parallel tasks", positiveInt)
  .action(
    action(async function (this: Command) {
      const opts = this.optsWithGlobals<
        GlobalOptions & {
          pipeline?: string;
          input?: string;
          runId?: string;
          endpoint?: string;
          out?: string;
          concurrency?: number;
        }
      >();
      const config = loadConfig(opts);
      const def = loadPipelineFile(opts.pipeline ?? STOCK_ANALYSIS_PIPELINE_PATH);
      const inputs = opts.input ? readJsonObject(opts.input) : defaultRunInput();

      const store = new RunStore(config.store.dbPath);
      try {
        const pipeline = new Pipeline(def, {
          catalog: createStockAnalysisCatalog(),
          store,
          config,
          capabilities: httpCapabilitiesFor(def),
        });
        if (opts.endpoint) {
          pipeline.addCapability(new HttpCapability({ name: "endpoint", url: opts.endpoint, kinds: ["*"] }));
        }
        const report = await pipeline.run({
          runId: opts.runId,
          inputs,
          maxConcurrency: opts.concurrency,
          signal: cancelOnSigint().signal,
          onTaskStart: (taskId) => log.debug(`Task "${taskId}" started`),
          onTaskAttempt: (taskId, attempt, error) => {
            if (error) log.warn(`Task "${taskId}" attempt ${attempt} failed`, { error: error.message });
          },
        });
        emit(report, config, opts.out);
      } finally {
        store.close();
      }
    }),
  );

// --- replay ---
program
  .command("replay")
  .description("Reproduce the terminal output of a recorded run from its log")
  .option("--run_id <id>", "Run to replay")
  .option("--run-id <id>", "Alias of --run_id")
  .option("-o, --out <file>", "Also write the terminal output to a file")
  .action(
    action(function (this: Command) {
      const opts = this.optsWithGlobals<GlobalOptions & { run_id?: string; runId?: string; out?: string }>();
      const runId = opts.run_id ?? opts.runId;
      if (!runId) throw new InvalidArgumentError("replay requires --run_id <id>");
      const config = loadConfig(opts);
      const store = new RunStore(config.store.dbPath);
      try {
        const { report, serialized } = new Replayer(store).replay(runId);
        emit(report, config, opts.out, serialized);
      } finally {
        store.close();
      }
    }),
  );

// --- test ---
program
  .command("test")
  .description("Run the built-in pipeline against a synthetic capability and verify its replay")
  .option("-f, --fail <kind...>", "Stage kinds whose calls always fail")
  .action(
    action(async function (this: Command) {
      const opts = this.optsWithGlobals<GlobalOptions & { fail?: string[] }>();
      const base = loadConfig({ ...opts, db: undefined });
      const config: StagelineConfig = {
        ...base,
        retry: { ...base.retry, baseDelayMs: 0 },
        store: { dbPath: opts.db ?? ":memory:" },
      };
      const store = new RunStore(config.store.dbPath);
      try {
        const pipeline = new Pipeline(loadPipelineFile(STOCK_ANALYSIS_PIPELINE_PATH), {
          catalog: createStockAnalysisCatalog(),
          store,
          config,
          capabilities: [createSyntheticCapability({ failKinds: opts.fail })],
        });
        const report = await pipeline.run({ inputs: defaultRunInput() });
        emit(report, config);

        const replayed = pipeline.replay(report.runId).serialized;
        if (replayed === serializeTerminalOutput(report.terminalOutput)) {
          console.error("Replay matches the recorded terminal output.");
        } else {
          console.error("Replay does NOT match the recorded terminal output.");
          process.exitCode = 1;
        }
      } finally {
        store.close();
      }
    }),
  );

// --- runs ---
program
  .command("runs")
  .description("List recorded runs, newest first")
  .option("-l, --limit <n>", "Max runs to list", positiveInt)
  .action(
    action(function (this: Command) {
      const opts = this.optsWithGlobals<GlobalOptions & { limit?: number }>();
      const config = loadConfig(opts);
      const store = new RunStore(config.store.dbPath);
      try {
        const runs = store.listRuns(opts.limit ?? config.limits.maxRuns);
        if (runs.length === 0) {
          console.log("No runs recorded.");
          return;
        }
        for (const r of runs) {
          console.log(
            `${r.runId}  ${r.status.padEnd(8)}  ${r.pipeline}  ${new Date(r.startedAt).toISOString()}  ` +
              `${r.recorded} recorded, ${r.fallbacks} fallback(s)`,
          );
        }
      } finally {
        store.close();
      }
    }),
  );

// --- show ---
program
  .command("show")
  .description("Per-task report of a recorded run")
  .argument("<runId>", "Run id")
  .action(
    action(function (this: Command, runId: string) {
      const opts = this.optsWithGlobals<GlobalOptions>();
      const config = loadConfig(opts);
      const store = new RunStore(config.store.dbPath);
      try {
        try {
          printReport(new Replayer(store).replay(runId).report, config.limits.outputTruncation);
        } catch (err) {
          const header = store.getRun(runId);
          if (!(err instanceof RunNotFoundError) || !header) throw err;
          // The run never recorded a task (e.g. its graph was rejected).
          console.error(`Run ${runId} (${header.pipeline}): ${header.status}${header.error ? ` (${header.error})` : ""}`);
          console.error("  No tasks recorded.");
        }
      } finally {
        store.close();
      }
    }),
  );

// --- validate ---
program
  .command("validate")
  .description("Build a pipeline's task graph and print its execution order without running it")
  .option("-p, --pipeline <file>", "Pipeline definition (default: built-in stock-analysis)")
  .action(
    action(function (this: Command) {
      const opts = this.optsWithGlobals<GlobalOptions & { pipeline?: string }>();
      const config = loadConfig(opts);
      const def = loadPipelineFile(opts.pipeline ?? STOCK_ANALYSIS_PIPELINE_PATH);
      const graph = buildGraphOnly(def, config);
      console.log(`Pipeline "${def.name}" is valid (${graph.order.length} tasks)`);
      graph.order.forEach((id, i) => {
        const task = graph.byId.get(id);
        const deps = task && task.dependsOn.length > 0 ? ` ← ${task.dependsOn.join(", ")}` : "";
        console.log(`  ${i + 1}. ${id} (${task?.kind ?? "?"})${deps}`);
      });
      console.log(`Sinks: ${graph.sinks.join(", ")}`);
    }),
  );

function buildGraphOnly(def: PipelineDefinition, config: StagelineConfig): TaskGraph {
  const store = new RunStore(":memory:");
  try {
    return new Pipeline(def, { catalog: createStockAnalysisCatalog(), store, config }).build();
  } finally {
    store.close();
  }
}

(async () => {
  try {
    await program.parseAsync();
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }
})().catch(() => {});
