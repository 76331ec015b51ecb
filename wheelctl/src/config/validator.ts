import { compileSchema, type SchemaCheck } from "../schema/ajv.js";
import type { MatrixConfig } from "../types/config.js";

const NON_EMPTY = { type: "string", minLength: 1 } as const;

const PYTHON_SPEC_SCHEMA = {
  type: "object",
  required: ["tag"],
  properties: {
    tag: NON_EMPTY,
    abi: { type: "string", default: "" },
  },
};

const WHEEL_SCHEMA = {
  type: "object",
  required: ["platform_tag", "platform_instance", "platform_arch", "python"],
  properties: {
    platform_tag: NON_EMPTY,
    platform_instance: NON_EMPTY,
    platform_arch: NON_EMPTY,
    python: { type: "array", items: PYTHON_SPEC_SCHEMA, minItems: 1 },
  },
};

/**
 * Matrix document schema. Python tags are only required to be non-empty
 * here; their format is checked during enumeration.
 */
export const CONFIG_SCHEMA = {
  type: "object",
  required: ["packages", "bucket", "key_prefix", "index_url"],
  properties: {
    bucket: NON_EMPTY,
    key_prefix: { type: "string" },
    index_url: { type: "string", format: "uri" },
    region: NON_EMPTY,
    packages: {
      type: "object",
      propertyNames: NON_EMPTY,
      additionalProperties: {
        type: "object",
        required: ["versions"],
        properties: {
          versions: {
            type: "object",
            propertyNames: NON_EMPTY,
            additionalProperties: {
              type: "object",
              required: ["wheels"],
              properties: {
                wheels: { type: "array", items: WHEEL_SCHEMA },
              },
            },
          },
        },
      },
    },
  },
};

const check = compileSchema<MatrixConfig>(CONFIG_SCHEMA, { useDefaults: true, dataVar: "config" });

/**
 * Validate a loaded config against the config schema. Fills `abi: ""` into
 * python specs that omit it.
 */
export function validateConfig(config: unknown): SchemaCheck<MatrixConfig> {
  return check(config);
}
