import type { TransformFnParams } from 'class-transformer';

/**
 * Trims string fields before validation so whitespace-only values fail `@IsNotEmpty`
 */
export function trimString({ value }: TransformFnParams): unknown {
  return typeof value === 'string' ? value.trim() : value;
}
