import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { BuildControl, BuildInvocation, BuilderOutcome, ImageBuilder } from "../src/builder/builder.js";
import type { HeadInfo, RepositoryStateProvider, TagInfo } from "../src/git/repository-state.js";
import type { EnvSnapshot } from "../src/types/build.js";
import { loadConfig } from "../src/config/loader.js";
import { allUnits, buildLayout, planBuild } from "../src/core/plan.js";

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `genesis-${prefix}-`));
}

/** Write files (path → content) under root, creating directories. */
export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
}

export function ok(output = ""): BuilderOutcome {
  return { exitCode: 0, signal: null, timedOut: false, output };
}

/** Builder stand-in: records invocations and writes `image:<name>` to the destination. */
export class FakeBuilder implements ImageBuilder {
  readonly name = "fake";
  readonly calls: BuildInvocation[] = [];

  constructor(
    private readonly behavior: (inv: BuildInvocation, control: BuildControl) => Promise<BuilderOutcome> | BuilderOutcome = writeImage,
  ) {}

  async build(inv: BuildInvocation, control: BuildControl): Promise<BuilderOutcome> {
    this.calls.push(inv);
    return this.behavior(inv, control);
  }
}

export function writeImage(inv: BuildInvocation): BuilderOutcome {
  fs.mkdirSync(path.dirname(inv.destination), { recursive: true });
  fs.writeFileSync(inv.destination, `image:${inv.image}`);
  return ok(`built ${inv.image}`);
}

export class FakeRepository implements RepositoryStateProvider {
  constructor(
    public tag: TagInfo | null,
    public headInfo: HeadInfo | null,
  ) {}

  async nearestTag(): Promise<TagInfo | null> {
    return this.tag;
  }

  async head(): Promise<HeadInfo | null> {
    return this.headInfo;
  }
}

export const COMMIT = "0123456789abcdef0123456789abcdef01234567";

/** Write genesis/genesis.yaml under root and plan it with default layout settings. */
export function planProject(root: string, configYaml: string, env: EnvSnapshot = {}, version = "1.0.0") {
  writeFiles(root, { "genesis/genesis.yaml": configYaml });
  const loaded = loadConfig(root);
  const layout = buildLayout(loaded.projectRoot, { output_dir: "output", work_dir: ".genesis" });
  const elements = planBuild(loaded, { layout, env, version });
  return { loaded, layout, elements, units: allUnits(elements) };
}

export const THREE_IMAGES = `
build:
  elements:
    - images:
        - { name: img1, format: raw, profile: ubuntu_24 }
        - { name: img2, format: raw, profile: ubuntu_24 }
        - { name: img3, format: raw, profile: ubuntu_24 }
`;
