export type Diagnostic = {
  level: "error" | "warn" | "info" | "debug";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type OutputFormat = "human" | "jsonl";

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/** Sink for progress and failure diagnostics. */
export type Reporter = (d: Diagnostic) => void;

export const silentReporter: Reporter = () => {};

/**
 * Write diagnostics to a stream (stderr by default, so stdout carries only
 * pipeline directives). `debug` is dropped unless `verbose`.
 */
export function createReporter(
  format: OutputFormat,
  opts: { verbose?: boolean; write?: (line: string) => void } = {},
): Reporter {
  const write = opts.write ?? ((line: string) => process.stderr.write(line));
  return (d) => {
    if (d.level === "debug" && !opts.verbose) return;
    if (format === "jsonl") {
      write(JSON.stringify(d) + "\n");
    } else {
      write(d.level === "info" || d.level === "debug" ? `${d.message}\n` : `${d.level}: ${d.message}\n`);
    }
  };
}

/** Collects diagnostics in memory. */
export function collectingReporter(): Reporter & { diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const reporter = (d: Diagnostic) => {
    diagnostics.push(d);
  };
  return Object.assign(reporter, { diagnostics });
}
