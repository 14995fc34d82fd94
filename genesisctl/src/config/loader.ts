import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { GenesisError, errorMessage } from "../errors.js";
import { imageFileName } from "./catalog.js";
import { validateDocument, type RawDocument, type RawElement, type RawImage } from "./validator.js";
import type { Dependency, Element, GenesisConfig, ImageSpec, LoadedConfig } from "../types/config.js";

/** Location of the build config inside a project. */
export const CONFIG_RELATIVE_PATH = path.join("genesis", "genesis.yaml");

export function configPathFor(projectRoot: string): string {
  return path.join(path.resolve(projectRoot), CONFIG_RELATIVE_PATH);
}

/**
 * Load genesis/genesis.yaml from a project root.
 *
 * @throws GenesisError CONFIG_NOT_FOUND when the file is absent,
 *         CONFIG_MALFORMED when it does not parse or fails validation.
 */
export function loadConfig(projectRoot: string): LoadedConfig {
  const configPath = configPathFor(projectRoot);
  if (!fs.existsSync(configPath) || !fs.statSync(configPath).isFile()) {
    throw new GenesisError("CONFIG_NOT_FOUND", `Config not found: ${configPath}`);
  }

  const raw = fs.readFileSync(configPath, "utf8");
  return {
    projectRoot: path.resolve(projectRoot),
    configPath,
    configDir: path.dirname(configPath),
    config: parseConfig(raw, configPath),
  };
}

/** Parse and validate config text. `source` only labels error messages. */
export function parseConfig(text: string, source = "genesis.yaml"): GenesisConfig {
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (e) {
    throw new GenesisError("CONFIG_MALFORMED", `Cannot parse ${source}: ${errorMessage(e)}`);
  }

  const res = validateDocument(dropNulls(doc));
  if (!res.valid) {
    throw new GenesisError("CONFIG_MALFORMED", `Config invalid (${source}): ${res.errors}`);
  }

  const config = normalize(res.value);
  checkConsistency(config, source);
  return config;
}

/** Render a config in canonical form. `parseConfig(serializeConfig(c))` equals `c`. */
export function serializeConfig(config: GenesisConfig): string {
  const doc = {
    build: {
      deps: config.deps.map((d) => ({ dst: d.dst, path: { src: d.src } })),
      elements: config.elements.map((el) => ({
        ...(el.name !== null ? { name: el.name } : {}),
        images: el.images.map((img) => ({
          name: img.name,
          format: img.format,
          profile: img.profile,
          ...(img.script !== null ? { script: img.script } : {}),
          envs: img.envs,
          override: img.override,
        })),
        ...(el.manifest !== null ? { manifest: el.manifest } : {}),
        artifacts: el.artifacts,
      })),
    },
  };
  return YAML.stringify(doc);
}

/** Output directory name of an element: its explicit name, else its index. */
export function elementKey(element: Element, index: number): string {
  return element.name ?? String(index);
}

/**
 * Turn a dependency's in-image destination into a path relative to the
 * build context. Returns null when the destination cannot be staged.
 */
export function stagedRelativePath(dst: string): string | null {
  const rel = path.posix.normalize(dst.replace(/\\/g, "/")).replace(/^\/+/, "").replace(/\/+$/, "");
  if (rel === "" || rel === ".") return null;
  if (rel.split("/").includes("..")) return null;
  return rel;
}

// Empty YAML keys (`envs:`) parse as null; treat them as absent.
function dropNulls(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(dropNulls);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      if (v === null) continue;
      out[k] = dropNulls(v);
    }
    return out;
  }
  return value;
}

function normalize(doc: RawDocument): GenesisConfig {
  const deps: Dependency[] = (doc.build.deps ?? []).map((d) => ({
    dst: d.dst,
    src: d.path?.src ?? d.src ?? "",
  }));
  return { deps, elements: doc.build.elements.map(normalizeElement) };
}

function normalizeElement(el: RawElement): Element {
  return {
    name: el.name ?? null,
    images: el.images.map(normalizeImage),
    manifest: el.manifest ?? null,
    artifacts: el.artifacts ?? [],
  };
}

function normalizeImage(img: RawImage): ImageSpec {
  return {
    name: img.name,
    format: img.format,
    profile: img.profile,
    script: img.script ?? null,
    envs: img.envs ?? [],
    override: { ...(img.override ?? {}) },
  };
}

function checkConsistency(config: GenesisConfig, source: string): void {
  const problems: string[] = [];

  for (const dep of config.deps) {
    if (dep.src === "") problems.push(`dependency '${dep.dst}' has no src`);
    if (stagedRelativePath(dep.dst) === null) {
      problems.push(`dependency dst '${dep.dst}' is not a stageable path`);
    }
  }

  const elementKeys = new Set<string>();
  const imageNames = new Set<string>();

  config.elements.forEach((el, index) => {
    const key = elementKey(el, index);
    if (elementKeys.has(key)) problems.push(`duplicate element name '${key}'`);
    elementKeys.add(key);

    const outputNames = new Map<string, string>();
    const claim = (fileName: string, what: string) => {
      const prev = outputNames.get(fileName);
      if (prev) problems.push(`element '${key}': ${what} and ${prev} both produce '${fileName}'`);
      else outputNames.set(fileName, what);
    };

    for (const img of el.images) {
      if (imageNames.has(img.name)) problems.push(`duplicate image name '${img.name}'`);
      imageNames.add(img.name);
      claim(imageFileName(img.name, img.format), `image '${img.name}'`);
    }
    if (el.manifest !== null) claim(path.basename(el.manifest), "manifest");
    for (const artifact of el.artifacts) claim(path.basename(artifact), `artifact '${artifact}'`);
  });

  if (problems.length > 0) {
    throw new GenesisError("CONFIG_MALFORMED", `Config invalid (${source}): ${problems.join("; ")}`);
  }
}
