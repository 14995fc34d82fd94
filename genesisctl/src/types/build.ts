import type { ImageSpec, ParameterValue } from "./config.js";
import type { ImageFormat, OsProfile } from "../config/catalog.js";

/** Immutable copy of the invoking process's environment. */
export type EnvSnapshot = Readonly<Record<string, string | undefined>>;

/** Final parameter bag handed to the external builder for one image. */
export type ImageParameters = {
  profile: OsProfile;
  format: ImageFormat;
  /** Builder variables: catalog defaults with overrides applied. */
  variables: Record<string, ParameterValue>;
  /** Declared forwarded variable names, in declaration order. */
  envNames: string[];
  /** Forwarded variables that were set in the snapshot. */
  env: Record<string, string>;
};

export type VersionKind = "stable" | "rc" | "dev";

/** Stable tags never carry a timestamp or commit; rc and dev always do. */
export type VersionTag =
  | { kind: "stable"; base: string }
  | { kind: Exclude<VersionKind, "stable">; base: string; timestamp: string; commit: string };

export type ResolvedBuildUnit = {
  /** "<element>/<image>": ledger key. */
  key: string;
  elementIndex: number;
  elementKey: string;
  image: ImageSpec;
  parameters: ImageParameters;
  /** Absolute provisioning script path, if any. */
  scriptPath: string | null;
  stageRoot: string;
  /** True when the staged tree has at least one dependency. */
  hasDependencies: boolean;
  /** Exclusively owned by this unit while it runs. */
  workDir: string;
  /** Where the builder must leave the image file. */
  artifactPath: string;
  /** Final location in the output tree. */
  outputPath: string;
  version: string;
};

export type UnitStatus = "built" | "skipped" | "failed" | "cancelled";

export type UnitResult = {
  key: string;
  elementKey: string;
  image: string;
  status: UnitStatus;
  duration_ms: number;
  /** Final output path for built/skipped units. */
  outputPath?: string;
  error?: string;
  logPath?: string;
};

export type RunSummary = {
  ok: boolean;
  results: UnitResult[];
  counts: Record<UnitStatus, number>;
};
