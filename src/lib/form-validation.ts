/**
 * Three-level validation result for configuration fields.
 *
 * Warnings are advisory and never block a save; errors mark a value that
 * cannot be used as given.
 */

export type FormValidation =
  | { kind: 'ok' }
  | { kind: 'warning'; message: string }
  | { kind: 'error'; message: string };

const OK: FormValidation = Object.freeze({ kind: 'ok' });

export function ok(): FormValidation {
  return OK;
}

export function warning(message: string): FormValidation {
  return { kind: 'warning', message };
}

export function error(message: string): FormValidation {
  return { kind: 'error', message };
}
