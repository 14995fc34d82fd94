import { compileGuard, loadAjv } from "../schema/ajv.js";
import { FORMAT_NAMES, PROFILE_NAMES, type ImageFormat, type OsProfile } from "./catalog.js";
import type { ParameterValue } from "../types/config.js";
import type { GenesisSettings } from "../types/settings.js";

/** genesis.yaml as written on disk, before normalization. */
export type RawDependency = {
  dst: string;
  src?: string;
  path?: { src: string };
};

export type RawImage = {
  name: string;
  format: ImageFormat;
  profile: OsProfile;
  script?: string;
  envs?: string[];
  override?: Record<string, ParameterValue>;
};

export type RawElement = {
  name?: string;
  images: RawImage[];
  manifest?: string;
  artifacts?: string[];
};

export type RawDocument = {
  build: {
    deps?: RawDependency[];
    elements: RawElement[];
  };
};

const NAME_PATTERN = "^[A-Za-z0-9][A-Za-z0-9._-]*$";

const SCALAR = {
  anyOf: [{ type: "string" }, { type: "number" }, { type: "boolean" }],
};

/** genesis.yaml schema. Unknown fields are allowed. */
export const GENESIS_SCHEMA = {
  type: "object",
  required: ["build"],
  properties: {
    build: {
      type: "object",
      required: ["elements"],
      properties: {
        deps: {
          type: "array",
          items: {
            type: "object",
            required: ["dst"],
            properties: {
              dst: { type: "string", minLength: 1 },
              src: { type: "string", minLength: 1 },
              path: {
                type: "object",
                required: ["src"],
                properties: { src: { type: "string", minLength: 1 } },
              },
            },
          },
        },
        elements: {
          type: "array",
          minItems: 1,
          items: {
            type: "object",
            required: ["images"],
            properties: {
              name: { type: "string", pattern: NAME_PATTERN },
              manifest: { type: "string", minLength: 1 },
              artifacts: { type: "array", items: { type: "string", minLength: 1 } },
              images: {
                type: "array",
                minItems: 1,
                items: {
                  type: "object",
                  required: ["name", "format", "profile"],
                  properties: {
                    name: { type: "string", pattern: NAME_PATTERN },
                    format: { type: "string", enum: FORMAT_NAMES },
                    profile: { type: "string", enum: PROFILE_NAMES },
                    script: { type: "string", minLength: 1 },
                    envs: {
                      type: "array",
                      items: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" },
                    },
                    override: {
                      type: "object",
                      additionalProperties: SCALAR,
                    },
                  },
                },
              },
            },
          },
        },
      },
    },
  },
};

export const SETTINGS_SCHEMA = {
  type: "object",
  required: ["output_dir", "work_dir", "concurrency", "build_timeout_s", "builder_command", "release_branches"],
  properties: {
    output_dir: { type: "string", minLength: 1 },
    work_dir: { type: "string", minLength: 1 },
    concurrency: { type: "integer", minimum: 1 },
    build_timeout_s: { type: "integer", minimum: 0 },
    builder_command: { type: "string", minLength: 1 },
    release_branches: { type: "array", items: { type: "string", minLength: 1 } },
  },
};

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string };

const documentGuard = compileGuard<RawDocument>(loadAjv(), GENESIS_SCHEMA);
const settingsGuard = compileGuard<GenesisSettings>(loadAjv({ coerceTypes: true }), SETTINGS_SCHEMA);

/** Validate a parsed genesis.yaml document against the config schema. */
export function validateDocument(doc: unknown): ValidationResult<RawDocument> {
  if (documentGuard.check(doc)) return { valid: true, value: doc };
  return { valid: false, errors: documentGuard.errors("genesis") };
}

/** Validate merged settings. Numeric strings from the environment are coerced in place. */
export function validateSettings(settings: unknown): ValidationResult<GenesisSettings> {
  if (settingsGuard.check(settings)) return { valid: true, value: settings };
  return { valid: false, errors: settingsGuard.errors("settings") };
}
