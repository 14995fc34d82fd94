import path from "node:path";
import { isGenesisError } from "../errors.js";
import { loadConfig } from "../config/loader.js";
import { loadSettings } from "../config/settings.js";
import { allUnits, buildLayout, checkInputs, planBuild } from "../core/plan.js";
import { snapshotEnv } from "../core/parameters.js";
import { stageDependencies } from "../core/stager.js";
import { BuildOrchestrator } from "../core/orchestrator.js";
import { ArtifactCollector } from "../artifact-writer/collector.js";
import { buildBuildInfo, writeBuildInfo } from "../artifact-writer/build-info.js";
import { PackerBuilder } from "../builder/packer.js";
import { diag, silentReporter, type Reporter } from "../reporter.js";
import { resolveProjectVersion, type VersionOptions } from "./get-version.js";
import { exclusionDiagnostics } from "./validate.js";
import type { ImageBuilder } from "../builder/builder.js";
import type { EnvSnapshot, RunSummary } from "../types/build.js";
import type { CommandErrorCode } from "./exit-codes.js";

export type BuildOptions = VersionOptions & {
  devKeyPath?: string;
  force?: boolean;
  /** Overrides the concurrency setting. */
  jobs?: number;
  /** Overrides build_timeout_s. */
  timeoutS?: number;
  /** Resolve and print the plan; stage and build nothing. */
  dryRun?: boolean;
  reporter?: Reporter;
  signal?: AbortSignal;
  env?: EnvSnapshot;
  /** Defaults to Packer, per the builder_command setting. */
  builder?: ImageBuilder;
};

export type BuildResult =
  | {
      ok: true;
      version: string;
      outputRoot: string;
      /** Null for a dry run. */
      summary: RunSummary | null;
      buildInfoPath: string | null;
    }
  | {
      ok: false;
      error: { code: CommandErrorCode; message: string };
      version?: string;
      summary?: RunSummary;
    };

/**
 * build <project-root>: settings → config → version → inputs → staging →
 * orchestration → collection → build record.
 *
 * Anything failing before orchestration aborts the run with no unit
 * started. Unit failures are reported in the summary.
 */
export async function build(opts: BuildOptions): Promise<BuildResult> {
  const reporter = opts.reporter ?? silentReporter;
  const env = opts.env ?? snapshotEnv();

  try {
    const settings = loadSettings({
      projectRoot: opts.projectRoot,
      env,
      overrides: { concurrency: opts.jobs, build_timeout_s: opts.timeoutS },
    });
    const loaded = loadConfig(opts.projectRoot);
    const version = await resolveProjectVersion(opts, settings);
    reporter.emit(diag("info", "VERSION", `Version ${version}`, { version }));

    const layout = buildLayout(loaded.projectRoot, settings);
    const elements = planBuild(loaded, { layout, env, version });
    const devKeyPath = opts.devKeyPath !== undefined ? path.resolve(opts.devKeyPath) : undefined;
    checkInputs(elements, devKeyPath);

    const units = allUnits(elements);
    if (opts.dryRun) {
      for (const unit of units) {
        reporter.emit(
          diag("info", "PLAN_UNIT", `${unit.key} -> ${path.relative(loaded.projectRoot, unit.outputPath)}`, {
            unit: unit.key,
            parameters: unit.parameters.variables,
          }),
        );
      }
      return { ok: true, version, outputRoot: layout.outputRoot, summary: null, buildInfoPath: null };
    }

    const staged = await stageDependencies(loaded.config.deps, {
      configDir: loaded.configDir,
      stageRoot: layout.stageRoot,
      exclude: [layout.workRoot, layout.outputRoot],
    });
    for (const d of exclusionDiagnostics(staged.entries, loaded.projectRoot)) reporter.emit(d);
    reporter.emit(diag("info", "STAGED", `Staged ${staged.entries.length} dependencies into ${staged.root}`));

    const orchestrator = new BuildOrchestrator({
      builder: opts.builder ?? new PackerBuilder(settings.builder_command),
      concurrency: settings.concurrency,
      force: opts.force,
      timeoutMs: settings.build_timeout_s * 1000,
      signal: opts.signal,
      env,
      devKeyPath: devKeyPath ?? null,
      reporter,
    });
    const summary = await orchestrator.run(units);

    const collected = await new ArtifactCollector({ force: opts.force, reporter }).collect(elements, summary);
    const info = await buildBuildInfo({ outputRoot: layout.outputRoot, version, collected });
    const buildInfoPath = await writeBuildInfo(layout.outputRoot, info);

    reportSummary(reporter, summary, loaded.projectRoot);

    if (!summary.ok) {
      const code = summary.counts.cancelled > 0 && opts.signal?.aborted ? "CANCELLED" : "BUILD_FAILED";
      const message =
        code === "CANCELLED"
          ? `Build cancelled (${summary.counts.cancelled} image(s) cancelled)`
          : `${summary.counts.failed} image(s) failed, ${summary.counts.cancelled} cancelled`;
      return { ok: false, error: { code, message }, version, summary };
    }
    return { ok: true, version, outputRoot: layout.outputRoot, summary, buildInfoPath };
  } catch (e) {
    if (isGenesisError(e)) return { ok: false, error: { code: e.code, message: e.message } };
    throw e;
  }
}

function reportSummary(reporter: Reporter, summary: RunSummary, projectRoot: string): void {
  for (const r of summary.results) {
    const where = r.outputPath ? `  ${path.relative(projectRoot, r.outputPath)}` : r.error ? `  ${r.error}` : "";
    reporter.emit(
      diag(r.status === "failed" || r.status === "cancelled" ? "error" : "info", "SUMMARY", `${r.status.padEnd(9)} ${r.key}${where}`, {
        unit: r.key,
        status: r.status,
      }),
    );
  }
  const { built, skipped, failed, cancelled } = summary.counts;
  reporter.emit(
    diag(summary.ok ? "info" : "error", "RUN_COMPLETE", `built=${built} skipped=${skipped} failed=${failed} cancelled=${cancelled}`, {
      counts: summary.counts,
    }),
  );
}
