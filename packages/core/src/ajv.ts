import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';

// ajv ships CommonJS; the class sits on the default export under NodeNext.
const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true });

export function compileValidator<T>(schema: object): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

export function formatValidationErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'Unknown validation error';
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`).join('; ');
}
