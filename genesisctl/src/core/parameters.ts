import { BUILDER_DEFAULTS, FORMATS, PROFILES } from "../config/catalog.js";
import type { ParameterValue, ImageSpec } from "../types/config.js";
import type { EnvSnapshot, ImageParameters } from "../types/build.js";

/** Implicit builder defaults for a profile/format pair. */
export function defaultParameters(image: Pick<ImageSpec, "profile" | "format">): Record<string, ParameterValue> {
  return {
    ...BUILDER_DEFAULTS,
    ...PROFILES[image.profile],
    ...FORMATS[image.format].defaults,
  };
}

/**
 * Merge an image's overrides onto the defaults and pick its forwarded
 * variables out of `env`.
 *
 * Pure: no filesystem, no ambient process state. Each override replaces the
 * default value for its key outright. Forwarded names missing from `env`
 * stay unset; the builder decides whether that matters.
 */
export function mergeImageParameters(image: ImageSpec, env: EnvSnapshot): ImageParameters {
  const variables = defaultParameters(image);
  for (const [key, value] of Object.entries(image.override)) {
    variables[key] = value;
  }

  const forwarded: Record<string, string> = {};
  for (const name of image.envs) {
    const value = env[name];
    if (value !== undefined) forwarded[name] = value;
  }

  return {
    profile: image.profile,
    format: image.format,
    variables,
    envNames: [...image.envs],
    env: forwarded,
  };
}

/** Freeze a copy of the current environment for one run. */
export function snapshotEnv(env: NodeJS.ProcessEnv = process.env): EnvSnapshot {
  return Object.freeze({ ...env });
}
