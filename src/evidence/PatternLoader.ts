import * as fs from 'fs-extra';
import Ajv from 'ajv';
import { RedactionPattern } from '../types';
import { ValidationError, describeError } from '../errors';

const ajv = new Ajv({ allErrors: true });

const patternFileSchema = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      name: { type: 'string', minLength: 1 },
      pattern: { type: 'string', minLength: 1 },
      description: { type: 'string' },
      severity: { type: 'string', enum: ['critical', 'warning', 'info'] }
    },
    required: ['name', 'pattern', 'description', 'severity'],
    additionalProperties: false
  }
};

const validatePatternFile = ajv.compile<RedactionPattern[]>(patternFileSchema);

/**
 * Loads organization-specific redaction patterns. A missing file means
 * "no custom patterns"; a file that exists but does not match the schema
 * is a configuration error.
 */
export async function loadCustomPatterns(filePath: string): Promise<RedactionPattern[]> {
  if (!await fs.pathExists(filePath)) {
    return [];
  }

  let data: unknown;
  try {
    data = await fs.readJSON(filePath);
  } catch (error) {
    throw new ValidationError(`Custom pattern file ${filePath} is not valid JSON: ${describeError(error)}`);
  }

  if (!validatePatternFile(data)) {
    throw new ValidationError(`Custom pattern file ${filePath} is invalid: ${ajv.errorsText(validatePatternFile.errors)}`);
  }
  return data;
}

export const EXAMPLE_CUSTOM_PATTERNS: RedactionPattern[] = [
  {
    name: 'CustomSSN',
    pattern: String.raw`\b(SSN|SocSecNum|social_security|soc_sec_number)\s*[:=]\s*\d{3}-?\d{2}-?\d{4}\b`,
    description: 'Organization-specific SSN field names',
    severity: 'critical'
  },
  {
    name: 'CustomerID',
    pattern: String.raw`\bCUST-\d{8,10}\b`,
    description: 'Internal customer ID format (CUST-12345678)',
    severity: 'warning'
  },
  {
    name: 'EmployeeID',
    pattern: String.raw`\b(?:EMP|EMPID|EmployeeNumber)\s*[:=]\s*[A-Z]{2}\d{6}\b`,
    description: 'Employee identifiers (XX123456 format)',
    severity: 'warning'
  },
  {
    name: 'ProjectCode',
    pattern: String.raw`\b(?:PROJ|PROJECT)-[A-Z]{3,4}-\d{4}\b`,
    description: 'Internal project codes (PROJ-ABC-1234)',
    severity: 'info'
  }
];
