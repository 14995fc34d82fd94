import path from "node:path";
import { atomicWriteJson } from "./atomic.js";
import { computeSha256 } from "./checksum.js";
import type { CollectedElement } from "./collector.js";
import type { BuildInfo, BuildInfoElement, BuildInfoImage } from "../types/build-info.js";

export const BUILD_INFO_FILE = "build-info.json";

/**
 * Build the build record for a collected output tree. Image checksums are
 * computed from the files in place.
 */
export async function buildBuildInfo(input: {
  outputRoot: string;
  version: string;
  collected: readonly CollectedElement[];
}): Promise<BuildInfo> {
  const rel = (p: string) => path.relative(input.outputRoot, p).split(path.sep).join("/");

  const elements: BuildInfoElement[] = [];
  for (const el of input.collected) {
    const images: BuildInfoImage[] = [];
    for (const img of el.images) {
      images.push({
        name: img.image.name,
        file: rel(img.path),
        format: img.image.format,
        profile: img.image.profile,
        status: img.status,
        sha256: await computeSha256(img.path),
      });
    }
    elements.push({ name: el.key, images, files: el.files.map((f) => rel(f.path)), missing: [...el.missing] });
  }

  return {
    schema_version: "1.0.0",
    version: input.version,
    created_at: new Date().toISOString(),
    complete: elements.every((e) => e.missing.length === 0),
    elements,
  };
}

/** Write output/build-info.json atomically. Returns its path. */
export async function writeBuildInfo(outputRoot: string, info: BuildInfo): Promise<string> {
  const dest = path.join(outputRoot, BUILD_INFO_FILE);
  await atomicWriteJson(dest, info);
  return dest;
}
