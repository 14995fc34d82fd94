import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../errors.js";
import { diag, silentReporter, type Reporter } from "../reporter.js";
import { ResultLedger } from "./ledger.js";
import type { ImageBuilder } from "../builder/builder.js";
import type { EnvSnapshot, ResolvedBuildUnit, RunSummary, UnitResult } from "../types/build.js";

export const BUILD_LOG = "build.log";

export type OrchestratorOptions = {
  builder: ImageBuilder;
  /** Worker pool size. */
  concurrency?: number;
  /** Rebuild images whose output already exists. */
  force?: boolean;
  /** Per-invocation timeout; 0 disables. */
  timeoutMs?: number;
  signal?: AbortSignal;
  env?: EnvSnapshot;
  devKeyPath?: string | null;
  reporter?: Reporter;
};

/**
 * BuildOrchestrator: runs one builder invocation per unit on a bounded
 * worker pool.
 *
 * Units whose output already exists are skipped unless `force` is set.
 * After the first failure no new unit is started; units already running
 * finish. Aborting `signal` kills running invocations. Every unit ends up
 * in the ledger as built, skipped, failed or cancelled.
 */
export class BuildOrchestrator {
  private readonly builder: ImageBuilder;
  private readonly concurrency: number;
  private readonly force: boolean;
  private readonly timeoutMs: number;
  private readonly signal: AbortSignal | undefined;
  private readonly env: EnvSnapshot;
  private readonly devKeyPath: string | null;
  private readonly reporter: Reporter;

  constructor(opts: OrchestratorOptions) {
    this.builder = opts.builder;
    this.concurrency = Math.max(1, Math.floor(opts.concurrency ?? 1));
    this.force = opts.force ?? false;
    this.timeoutMs = opts.timeoutMs ?? 0;
    this.signal = opts.signal;
    this.env = opts.env ?? {};
    this.devKeyPath = opts.devKeyPath ?? null;
    this.reporter = opts.reporter ?? silentReporter;
  }

  async run(units: readonly ResolvedBuildUnit[]): Promise<RunSummary> {
    const ledger = new ResultLedger();
    const queue: ResolvedBuildUnit[] = [];

    for (const unit of units) {
      if (!this.force && fs.existsSync(unit.outputPath)) {
        this.record(ledger, {
          key: unit.key,
          elementKey: unit.elementKey,
          image: unit.image.name,
          status: "skipped",
          duration_ms: 0,
          outputPath: unit.outputPath,
        });
        continue;
      }
      queue.push(unit);
    }

    let halted = false;

    const worker = async (): Promise<void> => {
      for (let unit = queue.shift(); unit; unit = queue.shift()) {
        if (this.signal?.aborted) {
          this.record(ledger, notStarted(unit, "run cancelled"));
          continue;
        }
        if (halted) {
          this.record(ledger, notStarted(unit, "not started after an earlier failure"));
          continue;
        }
        const result = await this.execute(unit);
        this.record(ledger, result);
        if (result.status === "failed") halted = true;
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, queue.length) }, () => worker());
    await Promise.all(workers);

    return ledger.summarize(units.map((u) => u.key));
  }

  private async execute(unit: ResolvedBuildUnit): Promise<UnitResult> {
    const started = Date.now();
    const base = { key: unit.key, elementKey: unit.elementKey, image: unit.image.name };
    const logPath = path.join(unit.workDir, BUILD_LOG);

    this.reporter.emit(diag("info", "UNIT_STARTED", `Building ${unit.key}`, { unit: unit.key }));

    try {
      await fs.promises.rm(unit.workDir, { recursive: true, force: true });
      await fs.promises.mkdir(path.dirname(unit.artifactPath), { recursive: true });

      const outcome = await this.builder.build(
        {
          unitKey: unit.key,
          element: unit.elementKey,
          image: unit.image.name,
          parameters: unit.parameters,
          scriptPath: unit.scriptPath,
          stageRoot: unit.stageRoot,
          hasDependencies: unit.hasDependencies,
          workDir: unit.workDir,
          destination: unit.artifactPath,
          version: unit.version,
          devKeyPath: this.devKeyPath,
          env: this.env,
        },
        { signal: this.signal, timeoutMs: this.timeoutMs },
      );
      await fs.promises.writeFile(logPath, outcome.output, "utf8");

      const duration_ms = Date.now() - started;
      if (outcome.failure !== undefined) {
        return { ...base, status: "failed", duration_ms, logPath, error: `Build of image '${unit.image.name}' failed: ${outcome.failure}` };
      }
      if (outcome.timedOut) {
        return { ...base, status: "failed", duration_ms, logPath, error: `Build of image '${unit.image.name}' timed out` };
      }
      if (outcome.exitCode !== 0) {
        const how = outcome.exitCode === null ? `signal ${outcome.signal ?? "unknown"}` : `exit code ${outcome.exitCode}`;
        return { ...base, status: "failed", duration_ms, logPath, error: `Build of image '${unit.image.name}' failed (${how})` };
      }
      if (!fs.existsSync(unit.artifactPath)) {
        return {
          ...base,
          status: "failed",
          duration_ms,
          logPath,
          error: `Builder produced no image file for '${unit.image.name}' at ${unit.artifactPath}`,
        };
      }
      return { ...base, status: "built", duration_ms, outputPath: unit.outputPath, logPath };
    } catch (e) {
      const duration_ms = Date.now() - started;
      if (this.signal?.aborted) {
        return { ...base, status: "cancelled", duration_ms, error: "run cancelled" };
      }
      return { ...base, status: "failed", duration_ms, error: `Build of image '${unit.image.name}' failed: ${errorMessage(e)}` };
    }
  }

  private record(ledger: ResultLedger, result: UnitResult): void {
    if (!ledger.record(result)) return;
    const level = result.status === "failed" || result.status === "cancelled" ? "error" : "info";
    const message = result.error ? `${result.key}: ${result.status} (${result.error})` : `${result.key}: ${result.status}`;
    this.reporter.emit(diag(level, `UNIT_${result.status.toUpperCase()}`, message, { unit: result.key, status: result.status }));
  }
}

function notStarted(unit: ResolvedBuildUnit, reason: string): UnitResult {
  return {
    key: unit.key,
    elementKey: unit.elementKey,
    image: unit.image.name,
    status: "cancelled",
    duration_ms: 0,
    error: reason,
  };
}
