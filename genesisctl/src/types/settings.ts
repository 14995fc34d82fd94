/** Tool settings: layered config system. */
export type GenesisSettings = {
  output_dir: string;
  work_dir: string;
  concurrency: number;
  build_timeout_s: number;
  builder_command: string;
  release_branches: string[];
};
