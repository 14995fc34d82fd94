/** output/build-info.json: record of the last build into an output tree. */
export type BuildInfoImage = {
  name: string;
  /** Relative to the output root. */
  file: string;
  format: string;
  profile: string;
  status: "built" | "skipped";
  sha256: string;
};

export type BuildInfoElement = {
  name: string;
  images: BuildInfoImage[];
  /** Manifest and artifact files, relative to the output root. */
  files: string[];
  /** Images declared but not present (failed or cancelled). */
  missing: string[];
};

export type BuildInfo = {
  schema_version: "1.0.0";
  version: string;
  created_at: string;
  complete: boolean;
  elements: BuildInfoElement[];
};
