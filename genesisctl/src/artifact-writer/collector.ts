import fs from "node:fs";
import path from "node:path";
import { computeSha256 } from "./checksum.js";
import { atomicCopyFile, atomicMoveFile } from "./atomic.js";
import { diag, silentReporter, type Reporter } from "../reporter.js";
import type { PlannedElement } from "../core/plan.js";
import type { ImageSpec } from "../types/config.js";
import type { RunSummary, UnitResult } from "../types/build.js";

export type PlacedFile = {
  path: string;
  /** written: copied now; unchanged: an identical file was already there. */
  action: "written" | "unchanged";
};

export type CollectedImage = {
  image: ImageSpec;
  path: string;
  status: "built" | "skipped";
};

export type CollectedElement = {
  key: string;
  outputDir: string;
  images: CollectedImage[];
  files: PlacedFile[];
  /** Names of images with no file in the output tree. */
  missing: string[];
};

/**
 * Artifact Collector: assembles output/<element>/ once every unit of the
 * element has finished: image files, then the manifest and artifact files.
 *
 * Files only appear under their final name fully written (rename from a
 * temporary sibling). Without `force`, an existing file with identical
 * content is left untouched.
 */
export class ArtifactCollector {
  private readonly force: boolean;
  private readonly reporter: Reporter;

  constructor(opts: { force?: boolean; reporter?: Reporter } = {}) {
    this.force = opts.force ?? false;
    this.reporter = opts.reporter ?? silentReporter;
  }

  async collect(elements: readonly PlannedElement[], summary: RunSummary): Promise<CollectedElement[]> {
    const byKey = new Map(summary.results.map((r) => [r.key, r]));
    const collected: CollectedElement[] = [];
    for (const el of elements) {
      collected.push(await this.collectElement(el, byKey));
    }
    return collected;
  }

  async collectElement(el: PlannedElement, results: ReadonlyMap<string, UnitResult>): Promise<CollectedElement> {
    const out: CollectedElement = { key: el.key, outputDir: el.outputDir, images: [], files: [], missing: [] };

    for (const unit of el.units) {
      const result = results.get(unit.key);
      const status = result?.status;

      if (status === "built" && fs.existsSync(unit.artifactPath)) {
        await atomicMoveFile(unit.artifactPath, unit.outputPath);
        await fs.promises.rm(unit.workDir, { recursive: true, force: true });
        out.images.push({ image: unit.image, path: unit.outputPath, status: "built" });
      } else if ((status === "built" || status === "skipped") && fs.existsSync(unit.outputPath)) {
        out.images.push({ image: unit.image, path: unit.outputPath, status });
      } else {
        out.missing.push(unit.image.name);
      }
    }

    // An element without any image gets no manifest or artifacts either.
    if (out.images.length === 0) {
      this.reporter.emit(diag("warn", "ELEMENT_EMPTY", `Element ${el.key}: no images available, nothing collected`));
      return out;
    }

    const extras = el.manifestPath !== null ? [el.manifestPath, ...el.artifactPaths] : el.artifactPaths;
    for (const src of extras) {
      out.files.push(await this.placeFile(src, path.join(el.outputDir, path.basename(src))));
    }

    this.reporter.emit(
      diag("info", "ELEMENT_COLLECTED", `Element ${el.key}: ${out.images.length} image(s), ${out.files.length} file(s)`, {
        element: el.key,
      }),
    );
    return out;
  }

  private async placeFile(src: string, dest: string): Promise<PlacedFile> {
    if (!this.force && fs.existsSync(dest) && (await sameContent(src, dest))) {
      return { path: dest, action: "unchanged" };
    }
    await atomicCopyFile(src, dest);
    return { path: dest, action: "written" };
  }
}

async function sameContent(a: string, b: string): Promise<boolean> {
  const [sa, sb] = await Promise.all([fs.promises.stat(a), fs.promises.stat(b)]);
  if (sa.size !== sb.size) return false;
  const [ha, hb] = await Promise.all([computeSha256(a), computeSha256(b)]);
  return ha === hb;
}
