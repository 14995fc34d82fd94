export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  [field: string]: unknown;
};

export type OutputFormat = "human" | "jsonl";

export interface Reporter {
  emit(d: Diagnostic): void;
}

export type ReporterStreams = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

const processStreams: ReporterStreams = {
  stdout: (line) => process.stdout.write(line + "\n"),
  stderr: (line) => process.stderr.write(line + "\n"),
};

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Record<string, unknown>,
): Diagnostic {
  return { ...extra, level, code, message };
}

/**
 * jsonl: one JSON object per line on stdout.
 * human: the message alone; warnings and errors go to stderr.
 */
export function createReporter(format: OutputFormat, streams: ReporterStreams = processStreams): Reporter {
  return {
    emit(d) {
      if (format === "jsonl") {
        streams.stdout(JSON.stringify(d));
        return;
      }
      if (d.level === "info") streams.stdout(d.message);
      else streams.stderr(`${d.level}: ${d.message}`);
    },
  };
}

/** Reporter that records diagnostics in memory. */
export function collectingReporter(): Reporter & { diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  return {
    diagnostics,
    emit(d) {
      diagnostics.push(d);
    },
  };
}

export const silentReporter: Reporter = { emit() {} };
