import { GenesisError, errorMessage, isGenesisError } from "../errors.js";
import { explicitReleasePolicy, type ReleasePolicy } from "../git/release-policy.js";
import type { RepositoryStateProvider } from "../git/repository-state.js";
import type { VersionTag } from "../types/build.js";

export const FALLBACK_BASE = "0.0.0";
const COMMIT_LENGTH = 8;

export type VersionResolverOptions = {
  repository: RepositoryStateProvider;
  policy?: ReleasePolicy;
  /** Explicit release-candidate build mode. */
  releaseCandidate?: boolean;
  /** Read at resolution time. */
  now?: () => Date;
};

/**
 * Derive the build version from repository state.
 *
 * - clean HEAD exactly at a stable tag → `X.Y.Z`
 * - release candidate (per policy) → `X.Y.Z-rc+<timestamp>.<commit8>`
 * - anything else → `X.Y.Z-dev+<timestamp>.<commit8>`
 *
 * `X.Y.Z` is the nearest ancestor stable tag, or 0.0.0 without one.
 */
export class VersionResolver {
  private readonly repository: RepositoryStateProvider;
  private readonly policy: ReleasePolicy;
  private readonly releaseCandidate: boolean;
  private readonly now: () => Date;

  constructor(opts: VersionResolverOptions) {
    this.repository = opts.repository;
    this.policy = opts.policy ?? explicitReleasePolicy;
    this.releaseCandidate = opts.releaseCandidate ?? false;
    this.now = opts.now ?? (() => new Date());
  }

  /** @throws GenesisError VERSION_UNDETERMINED */
  async resolve(): Promise<VersionTag> {
    try {
      return await this.resolveTag();
    } catch (e) {
      if (isGenesisError(e)) throw e;
      throw new GenesisError("VERSION_UNDETERMINED", `Cannot read repository state: ${errorMessage(e)}`);
    }
  }

  async resolveString(): Promise<string> {
    return formatVersion(await this.resolve());
  }

  private async resolveTag(): Promise<VersionTag> {
    const head = await this.repository.head();
    if (head === null) {
      throw new GenesisError("VERSION_UNDETERMINED", "Repository has no commits; cannot derive a version");
    }

    const nearest = await this.repository.nearestTag();
    if (nearest !== null && nearest.exact && !head.dirty) {
      return { kind: "stable", base: nearest.tag };
    }

    const rc = this.policy({ branch: head.branch, releaseCandidate: this.releaseCandidate });
    return {
      kind: rc ? "rc" : "dev",
      base: nearest?.tag ?? FALLBACK_BASE,
      timestamp: formatTimestamp(this.now()),
      commit: head.commit.slice(0, COMMIT_LENGTH),
    };
  }
}

export function formatVersion(tag: VersionTag): string {
  if (tag.kind === "stable") return tag.base;
  return `${tag.base}-${tag.kind}+${tag.timestamp}.${tag.commit}`;
}

/** YYYYMMDDHHMMSS in UTC. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace(/[-:T]/g, "");
}
