import fs from "node:fs";
import YAML from "yaml";
import { ConfigError, errorMessage } from "../errors.js";
import type { MatrixConfig, MatrixSettings } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const DEFAULT_CONFIG_PATH = "wheel_matrix.yml";

export const DEFAULT_SETTINGS: MatrixSettings = {
  bucket: "spare-tire",
  key_prefix: "packages/",
  index_url: "https://pypi.org/pypi",
};

const SETTING_KEYS = ["bucket", "key_prefix", "index_url", "region"] as const satisfies readonly (keyof MatrixSettings)[];

type Doc = Record<string, unknown>;

function isDoc(value: unknown): value is Doc {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Doc, override: Doc): Doc {
  const result: Doc = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isDoc(val) && isDoc(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/**
 * Parse a YAML file into a mapping; anything else is a config error. Every
 * value in the document is a string, so scalars are read with the failsafe
 * schema: an unquoted `6.0:` stays `"6.0"` instead of becoming the number 6.
 */
function loadYaml(filePath: string): Doc {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`, { path: filePath });
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"), { schema: "failsafe" });
  } catch (e) {
    throw new ConfigError(`Failed to parse config (${filePath}): ${errorMessage(e)}`, { path: filePath }, { cause: e });
  }
  if (!isDoc(parsed)) {
    throw new ConfigError(`Config must be a mapping: ${filePath}`, { path: filePath });
  }
  return parsed;
}

/** Collect WHEELCTL_ prefixed settings, e.g. WHEELCTL_BUCKET → bucket. */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): Partial<MatrixSettings> {
  const prefix = "WHEELCTL_";
  const result: Partial<MatrixSettings> = {};
  for (const key of SETTING_KEYS) {
    const value = env[prefix + key.toUpperCase()];
    if (value !== undefined && value !== "") result[key] = value;
  }
  return result;
}

/**
 * Load layered config: defaults ← YAML document ← environment ← `overrides`,
 * then validate. Nothing here touches the network.
 *
 * @param overrides - Settings given on the command line.
 */
export function loadConfig(
  filePath: string = DEFAULT_CONFIG_PATH,
  overrides: Partial<MatrixSettings> = {},
  env: NodeJS.ProcessEnv = process.env,
): MatrixConfig {
  let merged = deepMerge({ ...DEFAULT_SETTINGS }, loadYaml(filePath));
  merged = deepMerge(merged, envOverrides(env));
  merged = deepMerge(merged, overrides);

  const res = validateConfig(merged);
  if (!res.valid) {
    throw new ConfigError(`Config invalid (${filePath}): ${res.errors}`, { path: filePath });
  }
  return res.value;
}
