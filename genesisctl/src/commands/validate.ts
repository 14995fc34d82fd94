import path from "node:path";
import { isGenesisError } from "../errors.js";
import { loadConfig } from "../config/loader.js";
import { loadSettings } from "../config/settings.js";
import { allUnits, buildLayout, checkInputs, planBuild } from "../core/plan.js";
import { snapshotEnv } from "../core/parameters.js";
import { canonicalPath, resolveDependencies, type StagedEntry } from "../core/stager.js";
import { diag, type Diagnostic } from "../reporter.js";
import type { EnvSnapshot } from "../types/build.js";
import type { GenesisErrorCode } from "../errors.js";

export type ValidateResult =
  | { ok: true; units: string[]; diagnostics: Diagnostic[] }
  | { ok: false; code: GenesisErrorCode; errors: Diagnostic[] };

/**
 * validate <project-root>: load settings and config, resolve dependencies
 * and check every referenced input exists. Nothing is staged or built.
 */
export function validateProject(opts: { projectRoot: string; env?: EnvSnapshot }): ValidateResult {
  const env = opts.env ?? snapshotEnv();
  try {
    const settings = loadSettings({ projectRoot: opts.projectRoot, env });
    const loaded = loadConfig(opts.projectRoot);
    const layout = buildLayout(loaded.projectRoot, settings);

    const deps = resolveDependencies(loaded.config.deps, {
      configDir: loaded.configDir,
      stageRoot: layout.stageRoot,
      exclude: [layout.workRoot, layout.outputRoot],
    });
    const elements = planBuild(loaded, { layout, env, version: "0.0.0" });
    checkInputs(elements);

    const units = allUnits(elements).map((u) => u.key);
    return {
      ok: true,
      units,
      diagnostics: [
        diag("info", "CONFIG_OK", `${loaded.configPath}: ${elements.length} element(s), ${units.length} image(s), ${deps.length} dependencies`, {
          path: loaded.configPath,
        }),
        ...exclusionDiagnostics(deps, loaded.projectRoot),
      ],
    };
  } catch (e) {
    if (isGenesisError(e)) return { ok: false, code: e.code, errors: [diag("error", e.code, e.message)] };
    throw e;
  }
}

/** One warning per dependency whose source encloses trees left out of staging. */
export function exclusionDiagnostics(entries: readonly StagedEntry[], projectRoot: string): Diagnostic[] {
  const root = canonicalPath(projectRoot);
  return entries
    .filter((e) => e.excluded.length > 0)
    .map((e) => {
      const names = e.excluded.map((p) => path.relative(root, p));
      return diag("warn", "STAGE_EXCLUDED", `Dependency '${e.dst}' contains ${names.join(", ")}; not staged`, {
        dst: e.dst,
        excluded: e.excluded,
      });
    });
}
