import { simpleGit } from "simple-git";

/** Nearest ancestor stable `X.Y.Z` tag. */
export type TagInfo = {
  tag: string;
  /** HEAD itself carries the tag. */
  exact: boolean;
};

export type HeadInfo = {
  commit: string;
  /** Tracked files differ from HEAD. */
  dirty: boolean;
  /** Current branch name, null when detached. */
  branch: string | null;
};

/** Repository facts the version resolver depends on. */
export interface RepositoryStateProvider {
  nearestTag(): Promise<TagInfo | null>;
  /** Null when the repository has no commits. */
  head(): Promise<HeadInfo | null>;
}

/** The slice of simple-git used here; fakes implement it in tests. */
export interface GitCommandRunner {
  raw(commands: string[]): Promise<string>;
}

// `git describe --long` output: <tag>-<distance>-g<sha>
const DESCRIBE_PATTERN = /^(\d+\.\d+\.\d+)-(\d+)-g[0-9a-f]+$/;

/**
 * Repository state read through simple-git.
 */
export class GitRepositoryState implements RepositoryStateProvider {
  private readonly git: GitCommandRunner;

  constructor(repoPath: string, git?: GitCommandRunner) {
    this.git = git ?? simpleGit(repoPath);
  }

  async nearestTag(): Promise<TagInfo | null> {
    // --always makes describe print a bare sha instead of failing when no tag matches.
    const out = await this.git.raw([
      "describe",
      "--tags",
      "--long",
      "--always",
      "--match",
      "[0-9]*.[0-9]*.[0-9]*",
      "--exclude",
      "*[!0-9.]*",
      "--exclude",
      "*.*.*.*",
      "HEAD",
    ]);
    const m = DESCRIBE_PATTERN.exec(out.trim());
    if (!m) return null;
    return { tag: m[1], exact: m[2] === "0" };
  }

  async head(): Promise<HeadInfo | null> {
    const commit = (await this.git.raw(["rev-parse", "--verify", "--quiet", "HEAD^{commit}"]).catch(noCommits)).trim();
    if (commit.length === 0) return null;

    const status = await this.git.raw(["status", "--porcelain", "--untracked-files=no"]);
    const branch = (await this.git.raw(["rev-parse", "--abbrev-ref", "HEAD"])).trim();

    return {
      commit,
      dirty: status.trim().length > 0,
      branch: branch === "HEAD" ? null : branch,
    };
  }
}

// rev-parse --verify --quiet exits 1 with no output on an unborn branch.
function noCommits(e: unknown): string {
  if (e instanceof Error && (e.message.trim() === "" || /unknown revision|Needed a single revision/i.test(e.message))) return "";
  throw e;
}
