import { minimatch } from "minimatch";

/**
 * Release policy: decides whether a non-stable build is a release candidate.
 */
export type ReleaseContext = {
  branch: string | null;
  /** Explicit release-candidate build mode (--rc). */
  releaseCandidate: boolean;
};

export type ReleasePolicy = (ctx: ReleaseContext) => boolean;

/**
 * rc when explicitly requested, or when the branch matches one of the
 * configured globs (e.g. "release/*"). Detached HEADs never match.
 */
export function branchReleasePolicy(patterns: readonly string[]): ReleasePolicy {
  return (ctx) => {
    if (ctx.releaseCandidate) return true;
    const branch = ctx.branch;
    if (branch === null) return false;
    return patterns.some((p) => minimatch(branch, p));
  };
}

/** Only the explicit flag produces release candidates. */
export const explicitReleasePolicy: ReleasePolicy = (ctx) => ctx.releaseCandidate;
