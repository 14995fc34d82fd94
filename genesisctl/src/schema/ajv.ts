import Ajv2020 from "ajv/dist/2020.js";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown, opts?: { dataVar?: string }) => string;
};

export type AjvOptions = {
  /** Coerce scalar strings (e.g. from environment variables) to the schema's types. */
  coerceTypes?: boolean;
};

export function loadAjv(opts: AjvOptions = {}): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };

  return new AjvCtor({ allErrors: true, strict: true, coerceTypes: opts.coerceTypes ?? false });
}

/**
 * Compile a schema into a type guard. The caller vouches that `schema`
 * describes `T`.
 */
export function compileGuard<T>(
  ajv: AjvInstance,
  schema: unknown,
): { check: (data: unknown) => data is T; errors: (dataVar?: string) => string } {
  const validate = ajv.compile(schema);
  return {
    check: (data: unknown): data is T => validate(data),
    errors: (dataVar?: string) => ajv.errorsText(validate.errors, { dataVar }),
  };
}
