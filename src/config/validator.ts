/**
 * Schema check for vmtrial.yaml.
 */

import Ajv, { type ErrorObject } from 'ajv';

import type { VmtrialConfig } from './types.js';
import configSchema from './schema.json' with { type: 'json' };

/**
 * One schema violation
 */
export interface ValidationError {
  /** JSON pointer into the document, `/` for the root */
  path: string;
  message: string;
  /** Ajv keyword parameters, e.g. `{ additionalProperty: 'machines' }` */
  params: Record<string, unknown>;
}

export type ValidationResult =
  | { valid: true; config: VmtrialConfig }
  | { valid: false; errors: ValidationError[] };

const ajv = new Ajv.default({ allErrors: true, verbose: true });
const checkSchema = ajv.compile<VmtrialConfig>(configSchema);

function describeViolation(error: ErrorObject): string {
  if (error.keyword === 'additionalProperties') {
    const key: unknown = error.params['additionalProperty'];
    if (typeof key === 'string') {
      return `unknown key '${key}'`;
    }
  }
  return error.message ?? `failed ${error.keyword} check`;
}

function toValidationError(error: ErrorObject): ValidationError {
  return {
    path: error.instancePath === '' ? '/' : error.instancePath,
    message: describeViolation(error),
    params: error.params,
  };
}

/**
 * Check parsed YAML against the schema.
 *
 * A document without content (the parser yields null or undefined) is an
 * empty configuration.
 */
export function validateConfig(data: unknown): ValidationResult {
  const document = data ?? {};
  if (checkSchema(document)) {
    return { valid: true, config: document };
  }
  return { valid: false, errors: (checkSchema.errors ?? []).map(toValidationError) };
}

/**
 * Render errors as an indented list, one per line.
 */
export function formatValidationErrors(errors: readonly ValidationError[]): string {
  return errors.map(({ path, message }) => `  - ${path || '/'}: ${message}`).join('\n');
}
