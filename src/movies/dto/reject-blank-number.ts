import { Transform, TransformFnParams } from 'class-transformer';

/**
 * Implicit conversion turns an empty or blank parameter into 0. This keeps it
 * as NaN so the number validators on the property reject it.
 */
export function RejectBlankNumber(): PropertyDecorator {
  return Transform(({ key, obj, value }: TransformFnParams) => {
    const raw: unknown = obj[key];
    return typeof raw === 'string' && raw.trim() === '' ? Number.NaN : value;
  });
}
