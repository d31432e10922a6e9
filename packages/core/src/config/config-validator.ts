/**
 * Config Schema Validator
 *
 * Validates services config files against JSON Schema using Ajv.
 * Applies schema defaults in place, so a valid document comes back filled in.
 */

import Ajv, { type ErrorObject } from 'ajv';
import servicesSchema from './services.schema.json';

const ajv = new Ajv({
  allErrors: true,      // Return all errors, not just the first one
  coerceTypes: true,    // Coerce types (e.g., "8080" -> 8080)
  removeAdditional: false,
  useDefaults: true,    // Apply default values from schema
  strict: false
});

ajv.addSchema(servicesSchema, 'services');

export interface ValidationResult {
  valid: boolean;
  errors: ErrorObject[] | null;
  errorMessage?: string;
}

function validateDefinition(definition: string, data: unknown): ValidationResult {
  const validate = ajv.getSchema(`services#/definitions/${definition}`);
  if (!validate) {
    throw new Error(`${definition} schema not found`);
  }

  const valid = validate(data);

  if (!valid) {
    return {
      valid: false,
      errors: validate.errors || null,
      errorMessage: formatErrors(validate.errors || [])
    };
  }

  return { valid: true, errors: null };
}

/**
 * Validate a whole services config document
 */
export function validateServicesConfig(data: unknown): ValidationResult {
  return validateDefinition('ServicesConfig', data);
}

/**
 * Validate a single catalog entry
 */
export function validateServiceDescriptor(data: unknown): ValidationResult {
  return validateDefinition('ServiceDescriptor', data);
}

/**
 * Format validation errors into human-readable message
 */
export function formatErrors(errors: ErrorObject[]): string {
  if (errors.length === 0) return 'Validation failed';

  const messages = errors.map(err => {
    const path = err.instancePath || 'root';
    const message = err.message || 'validation error';

    if (err.keyword === 'required' && 'missingProperty' in err.params) {
      return `${path}: missing required property ${err.params.missingProperty}`;
    }

    if (err.keyword === 'type' && 'type' in err.params) {
      return `${path}: ${message} (expected ${err.params.type})`;
    }

    if (err.keyword === 'enum' && 'allowedValues' in err.params) {
      const allowed: unknown[] = Array.isArray(err.params.allowedValues) ? err.params.allowedValues : [];
      return `${path}: must be one of [${allowed.join(', ')}]`;
    }

    if (err.keyword === 'additionalProperties' && 'additionalProperty' in err.params) {
      return `${path}: unknown property ${err.params.additionalProperty}`;
    }

    if (err.keyword === 'propertyNames' && 'propertyName' in err.params) {
      return `${path}: invalid service name '${err.params.propertyName}'`;
    }

    return `${path}: ${message}`;
  });

  return messages.join('; ');
}
