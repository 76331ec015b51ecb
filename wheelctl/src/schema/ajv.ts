import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown, options?: { dataVar?: string }) => string;
};

export type AjvOptions = {
  /** Fill `default` keywords into the validated data. */
  useDefaults?: boolean;
};

export type SchemaCheck<T> = { valid: true; value: T } | { valid: false; errors: string };

/** Create a strict 2020-12 validator with format support. */
export function loadAjv(opts: AjvOptions = {}): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, useDefaults: opts.useDefaults ?? false });
  add(ajv);

  return ajv;
}

/** Compile once; the returned checker narrows `data` to `T` when valid. */
export function compileSchema<T>(
  schema: unknown,
  opts: AjvOptions & { dataVar?: string } = {},
): (data: unknown) => SchemaCheck<T> {
  const ajv = loadAjv(opts);
  const validate = ajv.compile<T>(schema);
  return (data) => {
    if (validate(data)) return { valid: true, value: data };
    return { valid: false, errors: ajv.errorsText(validate.errors, { dataVar: opts.dataVar ?? "data" }) };
  };
}
