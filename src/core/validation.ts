/**
 * @fileoverview Ajv-based validation for configuration and scheduler options.
 *
 * Two Ajv instances share one error formatter:
 * - `strictAjv` validates values handed in from code (scheduler options,
 *   serialized records) without touching them.
 * - `configAjv` coerces raw configuration values (environment strings) into
 *   their schema types and fills in defaults.
 *
 * @module core/validation
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { SchedulerError } from './errors';
import { SerializedJobRecord, jobRecordListSchema, jobRecordSchema } from './scheduler/types';

export const strictAjv = new Ajv({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
  removeAdditional: false,
  useDefaults: false,
  coerceTypes: false,
});

export const configAjv = new Ajv({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
  useDefaults: true,
  coerceTypes: 'array',
});

function paramString(err: ErrorObject, name: string): string {
  const value: unknown = err.params[name];
  return value === undefined ? 'unknown' : String(value);
}

/**
 * Format Ajv errors into one readable message.
 */
export function formatErrors(errors: ErrorObject[] | null | undefined, subject: string): string {
  if (!errors || errors.length === 0) {
    return `Invalid ${subject} (no details available)`;
  }

  const messages: string[] = [];
  const seen = new Set<string>();

  for (const err of errors) {
    const path = err.instancePath || '/';

    const key = `${path}:${err.keyword}`;
    if (seen.has(key)) continue;
    seen.add(key);

    switch (err.keyword) {
      case 'required':
        messages.push(`Missing required field '${paramString(err, 'missingProperty')}' at ${path}`);
        break;
      case 'additionalProperties':
        messages.push(`Unknown property '${paramString(err, 'additionalProperty')}' at ${path}`);
        break;
      case 'type':
        messages.push(`Expected ${paramString(err, 'type')} at ${path}`);
        break;
      case 'enum': {
        const allowed = err.params.allowedValues;
        messages.push(`Invalid value at ${path}. Allowed: ${Array.isArray(allowed) ? allowed.join(', ') : 'unknown'}`);
        break;
      }
      case 'minimum':
        messages.push(`Value at ${path} is too small (min ${paramString(err, 'limit')})`);
        break;
      case 'minLength':
        messages.push(`Value at ${path} is too short (min ${paramString(err, 'limit')} chars)`);
        break;
      default:
        messages.push(`${path}: ${err.message ?? err.keyword}`);
    }
  }

  return `Invalid ${subject}: ${messages.join('; ')}`;
}

/**
 * Run a compiled validator and throw `invalid-argument` on failure.
 */
export function assertValid<T>(validate: ValidateFunction<T>, value: unknown, subject: string): asserts value is T {
  if (!validate(value)) {
    throw new SchedulerError('invalid-argument', formatErrors(validate.errors, subject));
  }
}

/**
 * Validators for serialized job records, for consumers checking what a
 * polling or push layer forwards.
 */
export const validateSerializedRecord = strictAjv.compile<SerializedJobRecord>(jobRecordSchema);
export const validateSerializedRecordList = strictAjv.compile<SerializedJobRecord[]>(jobRecordListSchema);
