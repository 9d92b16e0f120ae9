/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for extracted records and contract form payloads.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject } from 'ajv';
import { logger } from './logger';
import type { ContractForm, NormalizedRecord } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

// Schema loading - lazy loaded on first use
let normalizedRecordSchema: SchemaObject | null = null;
let contractFormSchema: SchemaObject | null = null;

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(moduleDir, '../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
    // Absolute path fallback (containers)
    `/app/docs/contracts/${schemaName}`,
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Return a permissive schema if file not found (for container environments)
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getNormalizedRecordSchema(): SchemaObject {
  if (!normalizedRecordSchema) {
    normalizedRecordSchema = loadSchema('normalized_record.schema.json');
  }
  return normalizedRecordSchema;
}

function getContractFormSchema(): SchemaObject {
  if (!contractFormSchema) {
    contractFormSchema = loadSchema('contract_form.schema.json');
  }
  return contractFormSchema;
}

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function validateWith<T>(schema: SchemaObject, data: unknown, label: string): ValidationResult<T> {
  const validate = ajv.compile<T>(schema);

  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  logger.warn(`${label} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate a NormalizedRecord against normalized_record.schema.json
 */
export function validateRecord(data: unknown): ValidationResult<NormalizedRecord> {
  return validateWith<NormalizedRecord>(getNormalizedRecordSchema(), data, 'NormalizedRecord');
}

/**
 * Validate a contract form payload against contract_form.schema.json
 */
export function validateContractForm(data: unknown): ValidationResult<ContractForm> {
  return validateWith<ContractForm>(getContractFormSchema(), data, 'ContractForm');
}

export const schemas = {
  get normalizedRecord() {
    return getNormalizedRecordSchema();
  },
  get contractForm() {
    return getContractFormSchema();
  },
};
