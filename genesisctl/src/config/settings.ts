import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { GenesisError, errorMessage } from "../errors.js";
import { validateSettings } from "./validator.js";
import type { GenesisSettings } from "../types/settings.js";
import type { EnvSnapshot } from "../types/build.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

/** Project-level settings file, relative to the project root. */
export const PROJECT_SETTINGS_PATH = path.join("genesis", "settings.yaml");

const ENV_PREFIX = "GENESIS_";
const LIST_KEYS = new Set(["release_branches"]);

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isRecord(val) && isRecord(prev)) {
      result[key] = deepMerge(prev, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Load a YAML mapping, or an empty object if the file does not exist. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new GenesisError("SETTINGS_INVALID", `Cannot parse ${filePath}: ${errorMessage(e)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new GenesisError("SETTINGS_INVALID", `Settings file is not a mapping: ${filePath}`);
  }
  return parsed;
}

/** GENESIS_OUTPUT_DIR → output_dir. List keys take comma-separated values. */
function envOverrides(env: EnvSnapshot): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const settingsKey = key.slice(ENV_PREFIX.length).toLowerCase();
    out[settingsKey] = LIST_KEYS.has(settingsKey)
      ? value.split(",").map((s) => s.trim()).filter((s) => s.length > 0)
      : value;
  }
  return out;
}

/**
 * Load layered settings: base.yaml ← <project>/genesis/settings.yaml ←
 * GENESIS_* environment variables ← explicit overrides (CLI flags).
 */
export function loadSettings(opts: {
  projectRoot?: string;
  env?: EnvSnapshot;
  overrides?: Partial<GenesisSettings>;
  configDir?: string;
} = {}): GenesisSettings {
  let merged = loadYaml(path.join(opts.configDir ?? CONFIG_DIR, "base.yaml"));

  if (opts.projectRoot) {
    merged = deepMerge(merged, loadYaml(path.join(opts.projectRoot, PROJECT_SETTINGS_PATH)));
  }

  merged = deepMerge(merged, envOverrides(opts.env ?? process.env));

  if (opts.overrides) {
    merged = deepMerge(merged, { ...opts.overrides });
  }

  const res = validateSettings(merged);
  if (!res.valid) {
    throw new GenesisError("SETTINGS_INVALID", `Settings invalid: ${res.errors}`);
  }
  return res.value;
}
