import fs from "node:fs";
import path from "node:path";
import { GenesisError, isGenesisError } from "../errors.js";
import { loadSettings } from "../config/settings.js";
import { GitRepositoryState, type RepositoryStateProvider } from "../git/repository-state.js";
import { branchReleasePolicy } from "../git/release-policy.js";
import { VersionResolver } from "../version/resolver.js";
import type { EnvSnapshot } from "../types/build.js";
import type { GenesisSettings } from "../types/settings.js";
import type { CommandErrorCode } from "./exit-codes.js";

export type GetVersionResult =
  | { ok: true; version: string }
  | { ok: false; error: { code: CommandErrorCode; message: string } };

export type VersionOptions = {
  projectRoot: string;
  releaseCandidate?: boolean;
  repository?: RepositoryStateProvider;
  now?: () => Date;
};

/** Resolve the version string for a project. Shared by `get-version` and `build`. */
export async function resolveProjectVersion(
  opts: VersionOptions,
  settings: Pick<GenesisSettings, "release_branches">,
): Promise<string> {
  const root = path.resolve(opts.projectRoot);
  if (!opts.repository && !fs.existsSync(root)) {
    throw new GenesisError("VERSION_UNDETERMINED", `Project root not found: ${root}`);
  }
  const resolver = new VersionResolver({
    repository: opts.repository ?? new GitRepositoryState(root),
    policy: branchReleasePolicy(settings.release_branches),
    releaseCandidate: opts.releaseCandidate,
    now: opts.now,
  });
  return resolver.resolveString();
}

export async function getVersion(opts: VersionOptions & { env?: EnvSnapshot }): Promise<GetVersionResult> {
  try {
    const settings = loadSettings({ projectRoot: opts.projectRoot, env: opts.env });
    return { ok: true, version: await resolveProjectVersion(opts, settings) };
  } catch (e) {
    if (isGenesisError(e)) return { ok: false, error: { code: e.code, message: e.message } };
    throw e;
  }
}
