import fs from "node:fs";
import path from "node:path";
import { GenesisError } from "../errors.js";
import { imageFileName } from "../config/catalog.js";
import { elementKey } from "../config/loader.js";
import { mergeImageParameters } from "./parameters.js";
import type { Element, LoadedConfig } from "../types/config.js";
import type { EnvSnapshot, ResolvedBuildUnit } from "../types/build.js";
import type { GenesisSettings } from "../types/settings.js";

export type BuildLayout = {
  outputRoot: string;
  workRoot: string;
  stageRoot: string;
  unitsRoot: string;
};

export type PlannedElement = {
  index: number;
  key: string;
  element: Element;
  outputDir: string;
  manifestPath: string | null;
  artifactPaths: string[];
  units: ResolvedBuildUnit[];
};

export function buildLayout(projectRoot: string, settings: Pick<GenesisSettings, "output_dir" | "work_dir">): BuildLayout {
  const workRoot = path.resolve(projectRoot, settings.work_dir);
  return {
    outputRoot: path.resolve(projectRoot, settings.output_dir),
    workRoot,
    stageRoot: path.join(workRoot, "stage"),
    unitsRoot: path.join(workRoot, "units"),
  };
}

/**
 * Expand the config into one ResolvedBuildUnit per image, grouped by element.
 * Paths in the config resolve against the config file's directory.
 */
export function planBuild(
  loaded: LoadedConfig,
  ctx: { layout: BuildLayout; env: EnvSnapshot; version: string },
): PlannedElement[] {
  const hasDependencies = loaded.config.deps.length > 0;

  return loaded.config.elements.map((element, index) => {
    const key = elementKey(element, index);
    const outputDir = path.join(ctx.layout.outputRoot, key);

    const units = element.images.map((image): ResolvedBuildUnit => {
      const workDir = path.join(ctx.layout.unitsRoot, key, image.name);
      const fileName = imageFileName(image.name, image.format);
      return {
        key: `${key}/${image.name}`,
        elementIndex: index,
        elementKey: key,
        image,
        parameters: mergeImageParameters(image, ctx.env),
        scriptPath: image.script !== null ? path.resolve(loaded.configDir, image.script) : null,
        stageRoot: ctx.layout.stageRoot,
        hasDependencies,
        workDir,
        artifactPath: path.join(workDir, "out", fileName),
        outputPath: path.join(outputDir, fileName),
        version: ctx.version,
      };
    });

    return {
      index,
      key,
      element,
      outputDir,
      manifestPath: element.manifest !== null ? path.resolve(loaded.configDir, element.manifest) : null,
      artifactPaths: element.artifacts.map((a) => path.resolve(loaded.configDir, a)),
      units,
    };
  });
}

/**
 * Check that every file the build reads besides dependencies exists:
 * provisioning scripts, manifests, artifacts and the developer key.
 *
 * @throws GenesisError INPUT_MISSING listing every missing file.
 */
export function checkInputs(elements: readonly PlannedElement[], devKeyPath?: string): void {
  const missing: string[] = [];
  const check = (p: string | null, what: string) => {
    if (p !== null && !isFile(p)) missing.push(`${what}: ${p}`);
  };

  for (const el of elements) {
    for (const unit of el.units) check(unit.scriptPath, `script of image '${unit.image.name}'`);
    check(el.manifestPath, `manifest of element '${el.key}'`);
    for (const a of el.artifactPaths) check(a, `artifact of element '${el.key}'`);
  }
  if (devKeyPath !== undefined) check(devKeyPath, "developer key");

  if (missing.length > 0) {
    throw new GenesisError("INPUT_MISSING", `Missing build inputs: ${missing.join("; ")}`);
  }
}

export function allUnits(elements: readonly PlannedElement[]): ResolvedBuildUnit[] {
  return elements.flatMap((el) => el.units);
}

function isFile(p: string): boolean {
  return fs.existsSync(p) && fs.statSync(p).isFile();
}
