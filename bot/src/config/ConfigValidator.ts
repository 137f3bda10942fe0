import { ILogger } from '../core/interfaces/ILogger';

export interface ValidationRule {
  type: 'string' | 'number' | 'boolean' | 'object';
  required?: boolean;
  min?: number;
  max?: number;
  pattern?: RegExp;
  enum?: readonly string[];
  nested?: ValidationSchema;
}

export interface ValidationSchema {
  [key: string]: ValidationRule;
}

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
  expected?: string;
}

export interface ValidationWarning {
  field: string;
  message: string;
  suggestion?: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

const SNOWFLAKE = /^\d{17,20}$/;

const section = (nested: ValidationSchema): ValidationRule => ({ type: 'object', required: true, nested });

export const WARDLINE_SCHEMA: ValidationSchema = {
  discord: section({
    token: { type: 'string' },
    adminChannelId: { type: 'string', pattern: SNOWFLAKE }
  }),
  database: section({
    path: { type: 'string', required: true }
  }),
  lexicon: section({
    bannedWordsPath: { type: 'string', required: true },
    exceptionsPath: { type: 'string', required: true }
  }),
  classifier: section({
    modelPath: { type: 'string', required: true }
  }),
  moderation: section({
    deletionDelayHours: { type: 'number', required: true, min: 0, max: 24 * 30 },
    sweepIntervalSeconds: { type: 'number', required: true, min: 1, max: 3600 },
    deleteTimeoutMs: { type: 'number', required: true, min: 100, max: 120000 },
    spamThreshold: { type: 'number', required: true, min: 0, max: 1 }
  }),
  logging: section({
    level: { type: 'string', enum: ['error', 'warn', 'info', 'debug'] },
    filePath: { type: 'string' }
  })
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

function hasType(value: unknown, type: ValidationRule['type']): boolean {
  switch (type) {
    case 'number':
      return typeof value === 'number' && !Number.isNaN(value);
    case 'object':
      return isRecord(value);
    default:
      return typeof value === type;
  }
}

/**
 * Checks plain configuration objects against a schema, the bot's own by
 * default. Errors make a result invalid; unknown fields only produce warnings
 * so that older config files keep loading.
 */
export class ConfigValidator {
  private logger: ILogger;

  constructor(logger: ILogger) {
    this.logger = logger;
  }

  validate(config: unknown, schema: ValidationSchema = WARDLINE_SCHEMA): ValidationResult {
    const result: ValidationResult = { isValid: true, errors: [], warnings: [] };
    this.checkObject(isRecord(config) ? config : {}, schema, '', result);
    result.isValid = result.errors.length === 0;

    if (!result.isValid) {
      this.logger.warn('Configuration validation failed', {
        component: 'config_validator',
        errors: result.errors
      });
    }

    return result;
  }

  private checkObject(record: Record<string, unknown>, schema: ValidationSchema, prefix: string, result: ValidationResult): void {
    const fieldPath = (name: string): string => (prefix ? `${prefix}.${name}` : name);

    for (const [name, rule] of Object.entries(schema)) {
      const value = record[name];

      if (isPresent(value)) {
        this.checkValue(value, rule, fieldPath(name), result);
      } else if (rule.required) {
        result.errors.push({ field: fieldPath(name), message: 'Required field is missing', expected: `${rule.type} value` });
      }
    }

    for (const name of Object.keys(record).filter(key => !Object.hasOwn(schema, key))) {
      result.warnings.push({
        field: fieldPath(name),
        message: 'Unexpected field',
        suggestion: 'Remove this field or add it to the schema'
      });
    }
  }

  private checkValue(value: unknown, rule: ValidationRule, field: string, result: ValidationResult): void {
    if (!hasType(value, rule.type)) {
      result.errors.push({ field, message: 'Invalid type', value, expected: rule.type });
      return;
    }

    if (typeof value === 'number') {
      if (rule.min !== undefined && value < rule.min) {
        result.errors.push({ field, message: 'Value below minimum', value, expected: `>= ${rule.min}` });
      }
      if (rule.max !== undefined && value > rule.max) {
        result.errors.push({ field, message: 'Value above maximum', value, expected: `<= ${rule.max}` });
      }
    } else if (typeof value === 'string') {
      if (rule.pattern && !rule.pattern.test(value)) {
        result.errors.push({ field, message: "Value doesn't match pattern", value, expected: rule.pattern.toString() });
      }
      if (rule.enum && !rule.enum.includes(value)) {
        result.errors.push({ field, message: 'Invalid enum value', value, expected: `one of: ${rule.enum.join(', ')}` });
      }
    } else if (isRecord(value) && rule.nested) {
      this.checkObject(value, rule.nested, field, result);
    }
  }
}
