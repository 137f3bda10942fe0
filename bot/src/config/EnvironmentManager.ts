import fs from 'fs';
import path from 'path';
import { ConfigValidator, ValidationError, isRecord } from './ConfigValidator';
import { ILogger } from '../core/interfaces/ILogger';
import { ErrorHandler, ErrorCategory, ErrorSeverity } from '../utils/ErrorHandler';
import { ConfigurationError, toError } from '../utils/errors';

export interface WardlineConfig {
  discord: {
    token?: string | undefined;
    adminChannelId?: string | undefined;
  };

  database: {
    path: string;
  };

  lexicon: {
    bannedWordsPath: string;
    exceptionsPath: string;
  };

  classifier: {
    modelPath: string;
  };

  moderation: {
    deletionDelayHours: number;
    sweepIntervalSeconds: number;
    deleteTimeoutMs: number;
    spamThreshold: number;
  };

  logging: {
    level: string;
    filePath?: string | undefined;
  };
}

type Env = Record<string, string | undefined>;

/**
 * Reads typed values out of an untrusted JSON document, recording type
 * mismatches instead of silently falling back.
 */
class SectionReader {
  constructor(
    private source: Record<string, unknown>,
    private sectionName: string,
    private issues: ValidationError[]
  ) {}

  string(key: string, fallback: string): string {
    const value = this.source[key];
    if (value === undefined) return fallback;
    if (typeof value === 'string') return value;
    this.issues.push({ field: `${this.sectionName}.${key}`, message: 'Invalid type', value, expected: 'string' });
    return fallback;
  }

  optionalString(key: string, fallback: string | undefined): string | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value === 'string') return value;
    this.issues.push({ field: `${this.sectionName}.${key}`, message: 'Invalid type', value, expected: 'string' });
    return fallback;
  }

  number(key: string, fallback: number): number {
    const value = this.source[key];
    if (value === undefined) return fallback;
    if (typeof value === 'number') return value;
    this.issues.push({ field: `${this.sectionName}.${key}`, message: 'Invalid type', value, expected: 'number' });
    return fallback;
  }
}

export class EnvironmentManager {
  private logger: ILogger;
  private errorHandler: ErrorHandler;
  private configValidator: ConfigValidator;
  private configPath: string;
  private env: Env;
  private config?: WardlineConfig;

  constructor(
    logger: ILogger,
    errorHandler: ErrorHandler,
    configPath: string = './config/wardline.json',
    env: Env = process.env
  ) {
    this.logger = logger;
    this.errorHandler = errorHandler;
    this.configPath = path.resolve(configPath);
    this.env = env;
    this.configValidator = new ConfigValidator(logger);
  }

  /**
   * Defaults, then the JSON file, then environment variables. Throws
   * ConfigurationError when the result does not validate.
   */
  loadConfiguration(): WardlineConfig {
    this.logger.info('Loading configuration', {
      component: 'environment_manager',
      configPath: this.configPath
    });

    const issues: ValidationError[] = [];
    const fileConfig = this.applyFile(this.getDefaultConfiguration(), this.loadConfigurationFile(), issues);
    const finalConfig = this.applyEnvironmentOverrides(fileConfig);

    const validationResult = this.configValidator.validate(finalConfig);
    const errors = [...issues, ...validationResult.errors];

    if (errors.length > 0) {
      const errorMessage = `Configuration validation failed: ${errors
        .map(e => `${e.field}: ${e.message}`)
        .join(', ')}`;

      this.errorHandler.handleError(errorMessage, ErrorCategory.CONFIGURATION, ErrorSeverity.CRITICAL, {
        operation: 'load_config',
        component: 'environment_manager'
      });

      throw new ConfigurationError(errorMessage);
    }

    if (validationResult.warnings.length > 0) {
      this.logger.warn('Configuration warnings detected', {
        component: 'environment_manager',
        warnings: validationResult.warnings
      });
    }

    this.config = finalConfig;
    return finalConfig;
  }

  getConfiguration(): WardlineConfig {
    if (!this.config) {
      throw new ConfigurationError('Configuration not loaded. Call loadConfiguration() first.');
    }
    return this.config;
  }

  private loadConfigurationFile(): Record<string, unknown> {
    if (!fs.existsSync(this.configPath)) {
      this.logger.warn('Configuration file not found, using defaults', {
        component: 'environment_manager',
        configPath: this.configPath
      });
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
    } catch (error) {
      this.errorHandler.handleParsingError(toError(error), this.configPath, {
        operation: 'parse_config_file',
        component: 'environment_manager'
      });
      throw new ConfigurationError(`Configuration file ${this.configPath} is not valid JSON`, { cause: error });
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Configuration file ${this.configPath} must contain a JSON object`);
    }

    return parsed;
  }

  private applyFile(
    base: WardlineConfig,
    file: Record<string, unknown>,
    issues: ValidationError[]
  ): WardlineConfig {
    const reader = (name: string): SectionReader => {
      const section = file[name];
      return new SectionReader(isRecord(section) ? section : {}, name, issues);
    };

    const discord = reader('discord');
    const database = reader('database');
    const lexicon = reader('lexicon');
    const classifier = reader('classifier');
    const moderation = reader('moderation');
    const logging = reader('logging');

    return {
      discord: {
        token: discord.optionalString('token', base.discord.token),
        adminChannelId: discord.optionalString('adminChannelId', base.discord.adminChannelId)
      },
      database: {
        path: database.string('path', base.database.path)
      },
      lexicon: {
        bannedWordsPath: lexicon.string('bannedWordsPath', base.lexicon.bannedWordsPath),
        exceptionsPath: lexicon.string('exceptionsPath', base.lexicon.exceptionsPath)
      },
      classifier: {
        modelPath: classifier.string('modelPath', base.classifier.modelPath)
      },
      moderation: {
        deletionDelayHours: moderation.number('deletionDelayHours', base.moderation.deletionDelayHours),
        sweepIntervalSeconds: moderation.number('sweepIntervalSeconds', base.moderation.sweepIntervalSeconds),
        deleteTimeoutMs: moderation.number('deleteTimeoutMs', base.moderation.deleteTimeoutMs),
        spamThreshold: moderation.number('spamThreshold', base.moderation.spamThreshold)
      },
      logging: {
        level: logging.string('level', base.logging.level),
        filePath: logging.optionalString('filePath', base.logging.filePath)
      }
    };
  }

  private applyEnvironmentOverrides(config: WardlineConfig): WardlineConfig {
    const env = this.env;
    const numberFrom = (value: string | undefined, fallback: number): number =>
      value === undefined || value.trim() === '' ? fallback : Number(value);

    return {
      discord: {
        token: env['DISCORD_TOKEN'] || config.discord.token,
        adminChannelId: env['ADMIN_CHANNEL_ID'] || config.discord.adminChannelId
      },
      database: {
        path: env['DATABASE_PATH'] || config.database.path
      },
      lexicon: {
        bannedWordsPath: env['BANNED_WORDS_PATH'] || config.lexicon.bannedWordsPath,
        exceptionsPath: env['EXCEPTIONS_PATH'] || config.lexicon.exceptionsPath
      },
      classifier: {
        modelPath: env['TRAINING_DATA_PATH'] || config.classifier.modelPath
      },
      moderation: {
        deletionDelayHours: numberFrom(env['DELETION_DELAY_HOURS'], config.moderation.deletionDelayHours),
        sweepIntervalSeconds: numberFrom(env['SWEEP_INTERVAL_SECONDS'], config.moderation.sweepIntervalSeconds),
        deleteTimeoutMs: config.moderation.deleteTimeoutMs,
        spamThreshold: config.moderation.spamThreshold
      },
      logging: {
        level: env['LOG_LEVEL']?.toLowerCase() || config.logging.level,
        filePath: env['LOG_FILE'] || config.logging.filePath
      }
    };
  }

  private getDefaultConfiguration(): WardlineConfig {
    return {
      discord: {},
      database: {
        path: './data/infractions.db'
      },
      lexicon: {
        bannedWordsPath: './data/banned_words.txt',
        exceptionsPath: './data/exceptions.txt'
      },
      classifier: {
        modelPath: './data/training_data.json'
      },
      moderation: {
        deletionDelayHours: 6,
        sweepIntervalSeconds: 60,
        deleteTimeoutMs: 10000,
        spamThreshold: 0.9
      },
      logging: {
        level: 'info',
        filePath: './logs/wardline.log'
      }
    };
  }
}
