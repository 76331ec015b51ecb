#!/usr/bin/env node

import { Command, Option } from "commander";
import { DEFAULT_CONFIG_PATH } from "./config/loader.js";
import { createReporter, diag, type OutputFormat, type Reporter } from "./diagnostics.js";
import { EXIT, usageExitCode } from "./commands/exit-codes.js";
import { generate, type GenerateResult } from "./commands/generate.js";
import { validateMatrixConfig } from "./commands/validate.js";
import { wheelFilename } from "./types/build-spec.js";
import type { MatrixSettings } from "./types/config.js";

type CommonOpts = {
  config: string;
  bucket?: string;
  keyPrefix?: string;
  indexUrl?: string;
  region?: string;
  format: OutputFormat;
  verbose?: boolean;
};

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to the wheel matrix YAML", DEFAULT_CONFIG_PATH)
    .option("--bucket <name>", "Artifact bucket (overrides config and WHEELCTL_BUCKET)")
    .option("--key-prefix <prefix>", "Key prefix wheels are published under")
    .option("--index-url <url>", "Package index JSON API base URL")
    .option("--region <region>", "Bucket region")
    .addOption(new Option("--format <format>", "Diagnostics format").choices(["human", "jsonl"]).default("human"))
    .option("-v, --verbose", "Log every lookup");
}

function settingsFrom(opts: CommonOpts): Partial<MatrixSettings> {
  const settings: Partial<MatrixSettings> = {};
  if (opts.bucket !== undefined) settings.bucket = opts.bucket;
  if (opts.keyPrefix !== undefined) settings.key_prefix = opts.keyPrefix;
  if (opts.indexUrl !== undefined) settings.index_url = opts.indexUrl;
  if (opts.region !== undefined) settings.region = opts.region;
  return settings;
}

async function runGenerate(opts: CommonOpts, report: Reporter): Promise<Extract<GenerateResult, { ok: true }>> {
  const res = await generate({ configPath: opts.config, settings: settingsFrom(opts), report });
  if (!res.ok) {
    report(diag("error", res.error.code, res.error.message, { details: res.error.details }));
    process.exit(res.exitCode);
  }
  return res;
}

const program = new Command();

program
  .name("wheelctl")
  .description("Compute the CI job matrix for wheels missing from the artifact bucket")
  .version("0.1.0")
  .exitOverride((err) => process.exit(usageExitCode(err)));

withCommonOptions(program.command("generate", { isDefault: true }))
  .description("Emit the job matrix as pipeline output variables")
  .action(async (opts: CommonOpts) => {
    const report = createReporter(opts.format, { verbose: opts.verbose });
    const res = await runGenerate(opts, report);
    report(diag("info", "MATRIX_EMIT", `dumping build matrix to variable \`matrix\` (${Object.keys(res.matrix).length} jobs)`));
    for (const line of res.directives) process.stdout.write(line + "\n");
  });

withCommonOptions(program.command("missing"))
  .description("List wheels missing from the artifact bucket")
  .action(async (opts: CommonOpts) => {
    const report = createReporter(opts.format, { verbose: opts.verbose });
    const res = await runGenerate(opts, report);
    for (const spec of res.missing) {
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ ...spec, filename: wheelFilename(spec) }) + "\n");
      } else {
        process.stdout.write(wheelFilename(spec) + "\n");
      }
    }
  });

withCommonOptions(program.command("validate"))
  .description("Check the wheel matrix YAML without contacting the index or bucket")
  .action((opts: CommonOpts) => {
    const report = createReporter(opts.format, { verbose: opts.verbose });
    const res = validateMatrixConfig({ configPath: opts.config, settings: settingsFrom(opts) });
    if (!res.ok) {
      for (const err of res.errors) report(err);
      process.exit(EXIT.INPUT_INVALID);
    }
    const { packages, versions, targets } = res.summary;
    report(diag("info", "OK", `OK: ${packages} packages, ${versions} versions, ${targets} build targets`, { details: res.summary }));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});
