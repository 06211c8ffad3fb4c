import Ajv, { ErrorObject } from 'ajv';

/** Shared validator instance; schemas are compiled once at module load. */
export const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

export function describeErrors(errors: ErrorObject[] | null | undefined): string {
  return errors?.map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('; ') ?? 'unknown validation error';
}
