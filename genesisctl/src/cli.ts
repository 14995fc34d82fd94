#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { build } from "./commands/build.js";
import { getVersion } from "./commands/get-version.js";
import { validateProject } from "./commands/validate.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import { createReporter, diag, type OutputFormat } from "./reporter.js";

const program = new Command();

program
  .name("genesisctl")
  .description("Build machine images for a project from genesis/genesis.yaml")
  .version("0.1.0")
  .exitOverride((err) => {
    // Usage errors exit with INVALID_ARGS; --help and --version keep 0.
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  });

function parseFormat(value: string): OutputFormat {
  if (value === "human" || value === "jsonl") return value;
  throw new InvalidArgumentError("expected human or jsonl");
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("expected a positive integer");
  return n;
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("expected a non-negative integer");
  return n;
}

/** Abort on SIGINT/SIGTERM so running builder processes are terminated. */
function cancellationSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = (sig: NodeJS.Signals) => {
    if (controller.signal.aborted) process.exit(EXIT.CANCELLED);
    process.stderr.write(`Received ${sig}, cancelling build (repeat to exit immediately)\n`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return controller.signal;
}

program
  .command("build")
  .description("Build every image declared in genesis/genesis.yaml")
  .argument("<project-root>", "Project root directory")
  .option("-i, --dev-key <path>", "Public SSH key installed into the images for development access")
  .option("-f, --force", "Rebuild images whose output already exists")
  .option(
    "-j, --jobs <n>",
    "Images built in parallel (default 1). After a failure no new image starts, so images still queued are cancelled",
    parsePositiveInt,
  )
  .option("--timeout <seconds>", "Per-image builder timeout (0 disables)", parseNonNegativeInt)
  .option("--rc", "Version the build as a release candidate")
  .option("--dry-run", "Print the build plan without staging or building")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    async (
      projectRoot: string,
      opts: {
        devKey?: string;
        force?: boolean;
        jobs?: number;
        timeout?: number;
        rc?: boolean;
        dryRun?: boolean;
        format: OutputFormat;
      },
    ) => {
      const reporter = createReporter(opts.format);
      const res = await build({
        projectRoot,
        devKeyPath: opts.devKey,
        force: opts.force,
        jobs: opts.jobs,
        timeoutS: opts.timeout,
        releaseCandidate: opts.rc,
        dryRun: opts.dryRun,
        reporter,
        signal: cancellationSignal(),
      });

      if (!res.ok) {
        reporter.emit(diag("error", res.error.code, res.error.message));
        process.exit(exitCodeFor(res.error.code));
      }
      process.exit(EXIT.SUCCESS);
    },
  );

program
  .command("get-version")
  .description("Print the version the project would be built as")
  .argument("<project-root>", "Project root directory")
  .option("--rc", "Version as a release candidate")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (projectRoot: string, opts: { rc?: boolean; format: OutputFormat }) => {
    const res = await getVersion({ projectRoot, releaseCandidate: opts.rc });
    const reporter = createReporter(opts.format);

    if (!res.ok) {
      reporter.emit(diag("error", res.error.code, res.error.message));
      process.exit(exitCodeFor(res.error.code));
    }
    reporter.emit(diag("info", "VERSION", res.version, { version: res.version }));
  });

program
  .command("validate")
  .description("Check genesis/genesis.yaml and the files it references")
  .argument("<project-root>", "Project root directory")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((projectRoot: string, opts: { format: OutputFormat }) => {
    const res = validateProject({ projectRoot });
    const reporter = createReporter(opts.format);

    if (!res.ok) {
      for (const err of res.errors) reporter.emit(err);
      process.exit(exitCodeFor(res.code));
    }
    for (const d of res.diagnostics) reporter.emit(d);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
