import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';

import type { ConfigKey } from '../types/config.js';

// ajv is CommonJS; under Node ESM the default import is module.exports.
const Ajv = AjvModule.default;

export const CONFIG_FIELD_SCHEMAS = {
  maxDenominator: { type: 'integer', minimum: 1 },
  singleDigitThreshold: { type: 'number', minimum: 0, maximum: 1 },
} as const satisfies Record<ConfigKey, object>;

export const CONFIG_SCHEMA = {
  $id: 'https://ratiofit.local/schemas/config.json',
  type: 'object',
  properties: CONFIG_FIELD_SCHEMAS,
  additionalProperties: false,
} as const;

let cachedValidator: ValidateFunction | undefined;

/**
 * Compiled validator for a merged config object. allErrors keeps reporting
 * after the first failing field so every bad field can be reset on its own.
 */
export function getConfigValidator(): ValidateFunction {
  if (!cachedValidator) {
    const ajv = new Ajv({ allErrors: true, strictNumbers: true });
    cachedValidator = ajv.compile(CONFIG_SCHEMA);
  }
  return cachedValidator;
}

export interface ConfigSchemaIssues {
  /** Known fields with at least one failing keyword */
  invalidFields: Set<string>;
  /** Keys the schema does not know, in report order */
  unknownKeys: string[];
}

export function collectConfigIssues(
  errors: readonly ErrorObject[] | null | undefined
): ConfigSchemaIssues {
  const invalidFields = new Set<string>();
  const unknownKeys: string[] = [];
  for (const error of errors ?? []) {
    if (error.keyword === 'additionalProperties') {
      const key: unknown = error.params.additionalProperty;
      if (typeof key === 'string' && !unknownKeys.includes(key)) {
        unknownKeys.push(key);
      }
      continue;
    }
    // instancePath is a JSON Pointer such as "/maxDenominator"
    const field = error.instancePath.split('/')[1];
    if (field) invalidFields.add(field);
  }
  return { invalidFields, unknownKeys };
}
