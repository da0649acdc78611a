/**
 * Shared utility types.
 */

export type Result<T, E = string> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ── Request body validation ──

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  maxLength?: number;
  enum?: readonly string[];
  min?: number;
  max?: number;
  integer?: boolean;
  /** Element type for arrays. */
  items?: Exclude<FieldType, 'array' | 'object'>;
}

export type BodySchema = Record<string, FieldSchema>;
