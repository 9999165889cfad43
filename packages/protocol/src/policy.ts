/**
 * Issuance policy loading
 *
 * Reads YAML or JSON policy documents from the file system. No network calls.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import type { ZodError } from 'zod';
import { PreconditionError, errorMessage } from '@vouchers/kernel';
import {
  formatIssues,
  IssuancePolicySchema,
  type IssuancePolicy,
  type IssuancePolicyInput,
} from '@vouchers/schema';

export type PolicyFormat = 'yaml' | 'json';

/**
 * Policy document could not be read or parsed
 */
export class PolicyLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PolicyLoadError';
  }
}

/**
 * Policy document parsed but does not match the schema
 */
export class PolicyValidationError extends PolicyLoadError {
  readonly issues: ZodError['issues'];

  constructor(message: string, issues: ZodError['issues']) {
    super(message);
    this.name = 'PolicyValidationError';
    this.issues = issues;
  }
}

/**
 * Validate policy values given in code
 *
 * @throws PreconditionError when a ceiling is not a positive integer
 */
export function createIssuancePolicy(input: IssuancePolicyInput = {}): IssuancePolicy {
  const result = IssuancePolicySchema.safeParse(input);
  if (!result.success) {
    throw new PreconditionError(`Invalid issuance policy: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * @throws PolicyValidationError on schema validation failure
 */
export function validateIssuancePolicy(obj: unknown): IssuancePolicy {
  // An empty YAML document parses to null
  const result = IssuancePolicySchema.safeParse(obj ?? {});
  if (!result.success) {
    throw new PolicyValidationError(
      `Policy validation failed: ${formatIssues(result.error)}`,
      result.error.issues
    );
  }
  return result.data;
}

/**
 * Parse a policy document, auto-detecting the format when no hint is given
 *
 * @throws PolicyLoadError on parse failure
 * @throws PolicyValidationError on schema validation failure
 */
export function parseIssuancePolicy(content: string, format?: PolicyFormat): IssuancePolicy {
  let parsed: unknown;

  try {
    if (format === 'json') {
      parsed = JSON.parse(content);
    } else if (format === 'yaml') {
      parsed = yaml.parse(content);
    } else {
      // JSON is valid YAML, but JSON.parse is stricter and faster
      try {
        parsed = JSON.parse(content);
      } catch {
        parsed = yaml.parse(content);
      }
    }
  } catch (err) {
    throw new PolicyLoadError(`Failed to parse policy: ${errorMessage(err)}`, { cause: err });
  }

  return validateIssuancePolicy(parsed);
}

/**
 * Load a policy file (.yaml, .yml or .json)
 */
export function loadIssuancePolicy(filePath: string): IssuancePolicy {
  const ext = path.extname(filePath).toLowerCase();
  let format: PolicyFormat | undefined;

  if (ext === '.json') {
    format = 'json';
  } else if (ext === '.yaml' || ext === '.yml') {
    format = 'yaml';
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new PolicyLoadError(`Failed to read policy file: ${errorMessage(err)}`, { cause: err });
  }

  return parseIssuancePolicy(content, format);
}

export function serializeIssuancePolicyYaml(policy: IssuancePolicy): string {
  return yaml.stringify(policy);
}
