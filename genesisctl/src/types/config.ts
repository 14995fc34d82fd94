/** Parsed genesis/genesis.yaml. Immutable once loaded. */
import type { ImageFormat, OsProfile } from "../config/catalog.js";

export type ParameterValue = string | number | boolean;

export type Dependency = {
  /** Path inside the image, e.g. "/opt/app". */
  dst: string;
  /** Local path, relative to the config file's directory. */
  src: string;
};

export type ImageSpec = {
  name: string;
  format: ImageFormat;
  profile: OsProfile;
  script: string | null;
  envs: string[];
  override: Record<string, ParameterValue>;
};

export type Element = {
  /** Explicit output directory name; the element index is used when null. */
  name: string | null;
  images: ImageSpec[];
  manifest: string | null;
  artifacts: string[];
};

export type GenesisConfig = {
  deps: Dependency[];
  elements: Element[];
};

/** A config together with where it was read from. */
export type LoadedConfig = {
  projectRoot: string;
  configPath: string;
  configDir: string;
  config: GenesisConfig;
};
