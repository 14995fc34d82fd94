import fs from "node:fs";
import path from "node:path";
import { GenesisError, errorMessage, isGenesisError } from "../errors.js";
import { stagedRelativePath } from "../config/loader.js";
import type { Dependency } from "../types/config.js";

export type StagedEntry = {
  dst: string;
  /** Absolute source path. */
  src: string;
  /** Absolute path inside the staged tree. */
  stagedPath: string;
  /** Excluded trees that lie inside `src` and are left out of the copy. */
  excluded: string[];
};

/** Read-only after staging completes; every build unit shares it. */
export type StagedTree = {
  readonly root: string;
  readonly entries: readonly StagedEntry[];
};

export type StageOptions = {
  configDir: string;
  stageRoot: string;
  /**
   * Trees never copied into the stage, e.g. the work and output roots of a
   * project that lists itself as a dependency. The stage root is always
   * excluded.
   */
  exclude?: readonly string[];
};

/**
 * Resolve each dependency's source (against `configDir`) and staged path.
 *
 * @throws GenesisError DEPENDENCY_MISSING when a `src` does not exist.
 */
export function resolveDependencies(deps: readonly Dependency[], opts: StageOptions): StagedEntry[] {
  const excludedRoots = excludedPaths(opts);

  return deps.map((dep) => {
    const declared = path.resolve(opts.configDir, dep.src);
    if (!fs.existsSync(declared)) {
      throw new GenesisError("DEPENDENCY_MISSING", `Dependency source not found: ${dep.src} (resolved to ${declared})`);
    }
    const rel = stagedRelativePath(dep.dst);
    if (rel === null) {
      throw new GenesisError("CONFIG_MALFORMED", `Dependency dst '${dep.dst}' is not a stageable path`);
    }
    // A symlinked source is staged by content; links inside it stay links.
    const src = fs.realpathSync(declared);
    return {
      dst: dep.dst,
      src,
      stagedPath: path.join(opts.stageRoot, ...rel.split("/")),
      excluded: excludedRoots.filter((p) => isInside(p, src)),
    };
  });
}

/**
 * Materialize declared dependencies under `stageRoot`, each at its `dst`
 * (made relative).
 *
 * The stage root is removed first, so a rerun never keeps files from an
 * earlier partial run. Symlinks are copied as links, never followed;
 * timestamps are preserved. Sockets, FIFOs and devices are not staged.
 *
 * @throws GenesisError STAGING_FAILED when a copy fails.
 */
export async function stageDependencies(deps: readonly Dependency[], opts: StageOptions): Promise<StagedTree> {
  const entries = resolveDependencies(deps, opts);

  await fs.promises.rm(opts.stageRoot, { recursive: true, force: true });
  await fs.promises.mkdir(opts.stageRoot, { recursive: true });

  for (const entry of entries) {
    const skip = new Set(entry.excluded);
    try {
      await fs.promises.mkdir(path.dirname(entry.stagedPath), { recursive: true });
      await copyTree(entry.src, entry.stagedPath, skip);
    } catch (e) {
      if (isGenesisError(e)) throw e;
      throw new GenesisError("STAGING_FAILED", `Cannot stage ${entry.src} at ${entry.dst}: ${errorMessage(e)}`);
    }
  }

  return Object.freeze({ root: opts.stageRoot, entries: Object.freeze(entries) });
}

async function copyTree(src: string, dest: string, skip: ReadonlySet<string>): Promise<void> {
  const st = await fs.promises.lstat(src);

  if (st.isSymbolicLink()) {
    await fs.promises.rm(dest, { force: true });
    await fs.promises.symlink(await fs.promises.readlink(src), dest);
    await fs.promises.lutimes(dest, st.atime, st.mtime);
    return;
  }

  if (st.isDirectory()) {
    await fs.promises.mkdir(dest, { recursive: true });
    for (const name of await fs.promises.readdir(src)) {
      const child = path.join(src, name);
      if (skip.has(child)) continue;
      await copyTree(child, path.join(dest, name), skip);
    }
    // After the children: writing entries bumps the directory's mtime.
    await fs.promises.utimes(dest, st.atime, st.mtime);
    return;
  }

  if (st.isFile()) {
    await fs.promises.copyFile(src, dest);
    await fs.promises.utimes(dest, st.atime, st.mtime);
  }
}

// Nested exclusions collapse into the outermost one.
function excludedPaths(opts: StageOptions): string[] {
  const all = [...new Set([opts.stageRoot, ...(opts.exclude ?? [])].map(canonicalPath))];
  return all.filter((p) => !all.some((q) => isInside(p, q)));
}

/** Real path of `p`, resolving symlinks through its nearest existing ancestor. */
export function canonicalPath(p: string): string {
  const abs = path.resolve(p);
  if (fs.existsSync(abs)) return fs.realpathSync(abs);
  const parent = path.dirname(abs);
  return parent === abs ? abs : path.join(canonicalPath(parent), path.basename(abs));
}

function isInside(p: string, dir: string): boolean {
  const rel = path.relative(dir, p);
  return rel !== "" && rel.split(path.sep)[0] !== ".." && !path.isAbsolute(rel);
}
