import { describe, expect, it } from "vitest";
import path from "node:path";
import { DEFAULT_SETTINGS, envOverrides, loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { ConfigError } from "../src/errors.js";

const FIXTURES = path.resolve(import.meta.dirname, "fixtures");
const MATRIX = path.join(FIXTURES, "wheel_matrix.yml");

describe("config loader", () => {
  it("loads the matrix with default settings", () => {
    const config = loadConfig(MATRIX, {}, {});
    expect(config.bucket).toBe(DEFAULT_SETTINGS.bucket);
    expect(config.key_prefix).toBe("packages/");
    expect(config.index_url).toBe("https://pypi.org/pypi");
    expect(Object.keys(config.packages)).toEqual(["cryptography", "pyyaml"]);
    expect(Object.keys(config.packages.pyyaml.versions)).toEqual(["latest"]);
  });

  it("defaults a missing abi to an empty string", () => {
    const config = loadConfig(MATRIX, {}, {});
    expect(config.packages.pyyaml.versions.latest.wheels[0].python).toEqual([
      { tag: "cp39", abi: "" },
      { tag: "cp310", abi: "" },
    ]);
    expect(config.packages.cryptography.versions["36.0.1"].wheels[0].python).toEqual([{ tag: "cp38", abi: "abi3" }]);
  });

  it("keeps unquoted version keys as written", () => {
    const config = loadConfig(path.join(FIXTURES, "unquoted_versions.yml"), {}, {});
    expect(Object.keys(config.packages.pyyaml.versions)).toEqual(["6.0", "5.10"]);
  });

  it("applies environment variable overrides", () => {
    const config = loadConfig(MATRIX, {}, { WHEELCTL_BUCKET: "env-bucket", WHEELCTL_KEY_PREFIX: "wheels/" });
    expect(config.bucket).toBe("env-bucket");
    expect(config.key_prefix).toBe("wheels/");
  });

  it("command-line settings override the environment", () => {
    const config = loadConfig(MATRIX, { bucket: "cli-bucket" }, { WHEELCTL_BUCKET: "env-bucket" });
    expect(config.bucket).toBe("cli-bucket");
  });

  it("only reads known settings from the environment", () => {
    expect(envOverrides({ WHEELCTL_PACKAGES: "x", WHEELCTL_REGION: "eu-west-1", WHEELCTL_BUCKET: "" })).toEqual({
      region: "eu-west-1",
    });
  });

  it("fails on a missing file", () => {
    const missing = path.join(FIXTURES, "nope.yml");
    expect(() => loadConfig(missing, {}, {})).toThrow(new ConfigError(`Config file not found: ${missing}`));
  });

  it("fails on YAML syntax errors", () => {
    expect(() => loadConfig(path.join(FIXTURES, "broken.yml"), {}, {})).toThrow(/Failed to parse config/);
  });

  it("fails on missing wheel fields", () => {
    expect(() => loadConfig(path.join(FIXTURES, "missing_fields.yml"), {}, {})).toThrow(
      /must have required property 'platform_instance'/,
    );
  });

  it("fails on a malformed index url", () => {
    expect(() => loadConfig(MATRIX, { index_url: "not a url" }, {})).toThrow(ConfigError);
  });
});

describe("config validator", () => {
  it("requires packages", () => {
    const res = validateConfig({ ...DEFAULT_SETTINGS });
    expect(res.valid).toBe(false);
    if (!res.valid) expect(res.errors).toContain("must have required property 'packages'");
  });

  it("accepts an empty package list", () => {
    expect(validateConfig({ ...DEFAULT_SETTINGS, packages: {} }).valid).toBe(true);
  });

  it("requires at least one python per wheel", () => {
    const res = validateConfig({
      ...DEFAULT_SETTINGS,
      packages: {
        pyyaml: {
          versions: {
            "6.0": { wheels: [{ platform_tag: "t", platform_instance: "i", platform_arch: "a", python: [] }] },
          },
        },
      },
    });
    expect(res.valid).toBe(false);
  });
});
