import type { EnvSnapshot, ImageParameters } from "../types/build.js";

/** Everything the external builder needs for one image. */
export type BuildInvocation = {
  unitKey: string;
  element: string;
  image: string;
  parameters: ImageParameters;
  scriptPath: string | null;
  /** Shared, read-only staged dependency tree. */
  stageRoot: string;
  hasDependencies: boolean;
  /** Private scratch directory of this invocation. */
  workDir: string;
  /** The builder must leave exactly one image file here on success. */
  destination: string;
  version: string;
  devKeyPath: string | null;
  /** Base environment for the builder process. */
  env: EnvSnapshot;
};

export type BuilderOutcome = {
  /** Null when the process was killed by a signal (e.g. on timeout). */
  exitCode: number | null;
  signal: string | null;
  timedOut: boolean;
  /** Combined stdout/stderr. */
  output: string;
  /** Set when the run was stopped for a reason other than its exit status. */
  failure?: string;
};

export type BuildControl = {
  signal?: AbortSignal;
  /** 0 or undefined disables the timeout. */
  timeoutMs?: number;
};

/**
 * External image builder. Implementations reject only when aborted through
 * `control.signal` or when the builder cannot be started at all.
 */
export interface ImageBuilder {
  readonly name: string;
  build(invocation: BuildInvocation, control: BuildControl): Promise<BuilderOutcome>;
}
