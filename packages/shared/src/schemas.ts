/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for naming policies and batch reports.
 */

import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import namingPolicySchema from '../schemas/naming_policy.schema.json';
import batchReportSchema from '../schemas/batch_report.schema.json';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

// Compiled lazily on first use
const validators = new Map<string, ValidateFunction>();

function getValidator(name: string, schema: object): ValidateFunction {
  let validate = validators.get(name);
  if (!validate) {
    validate = ajv.compile(schema);
    validators.set(name, validate);
  }
  return validate;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function runValidation(name: string, schema: object, data: unknown): ValidationResult {
  const validate = getValidator(name, schema);
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`) ?? [];
    logger.warn(`${name} validation failed`, { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate raw naming policy input against naming_policy.schema.json
 */
export function validateNamingPolicy(data: unknown): ValidationResult {
  return runValidation('NamingPolicy', namingPolicySchema, data);
}

/**
 * Validate a BatchReport against batch_report.schema.json
 */
export function validateBatchReport(data: unknown): ValidationResult {
  return runValidation('BatchReport', batchReportSchema, data);
}

export const schemas = {
  namingPolicy: namingPolicySchema,
  batchReport: batchReportSchema,
};
