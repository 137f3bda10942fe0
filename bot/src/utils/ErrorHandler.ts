import { ILogger, LogContext } from '../core/interfaces/ILogger';
import { PersistenceError } from './errors';
import { TimeoutError } from './timeout';

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  DATABASE = 'database',
  NETWORK = 'network',
  CONFIGURATION = 'configuration',
  PERMISSION = 'permission',
  PARSING = 'parsing',
  TIMEOUT = 'timeout',
  UNKNOWN = 'unknown'
}

export interface ErrorContext {
  authorId?: string;
  channelId?: string;
  messageId?: string;
  infractionId?: number;
  operation?: string;
  component?: string;
  metadata?: Record<string, unknown>;
}

export interface StructuredError {
  id: string;
  timestamp: Date;
  message: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  context: ErrorContext;
  stackTrace?: string;
  originalError?: Error;
  resolved: boolean;
  resolution?: string;
}

export interface ErrorFilters {
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  resolved?: boolean;
  since?: Date;
  limit?: number;
}

export interface ErrorStats {
  total: number;
  unresolved: number;
  byCategory: Record<ErrorCategory, number>;
  bySeverity: Record<ErrorSeverity, number>;
}

type ErrorCallback = (error: StructuredError) => void;

const LOG_METHOD: Record<ErrorSeverity, 'error' | 'warn' | 'info'> = {
  [ErrorSeverity.CRITICAL]: 'error',
  [ErrorSeverity.HIGH]: 'error',
  [ErrorSeverity.MEDIUM]: 'warn',
  [ErrorSeverity.LOW]: 'info'
};

/**
 * Central record of operational failures. Anything the bot degrades around
 * (an unreadable lexicon, a rejected deletion, a lost store) is logged here
 * with a category and severity, kept in a bounded history and handed to the
 * callbacks registered for its severity.
 */
export class ErrorHandler {
  private logger: ILogger;
  private errors = new Map<string, StructuredError>();
  private callbacks = new Map<ErrorSeverity, ErrorCallback[]>();
  private maxErrorHistory: number;
  private sequence = 0;
  private processHandlersInstalled = false;

  constructor(logger: ILogger, maxErrorHistory: number = 1000) {
    this.logger = logger;
    this.maxErrorHistory = maxErrorHistory;
  }

  handleError(
    error: Error | string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context: ErrorContext = {}
  ): StructuredError {
    const record: StructuredError = {
      id: `err_${Date.now()}_${(++this.sequence).toString(36)}`,
      timestamp: new Date(),
      message: typeof error === 'string' ? error : error.message,
      category,
      severity,
      context,
      resolved: false
    };

    if (typeof error !== 'string') {
      record.originalError = error;
      if (error.stack) {
        record.stackTrace = error.stack;
      }
    }

    this.remember(record);
    this.log(record);
    this.notify(record);

    return record;
  }

  /** The infraction store failed. Always critical. */
  handlePersistenceError(error: PersistenceError, context: ErrorContext = {}): StructuredError {
    return this.handleError(error, ErrorCategory.DATABASE, ErrorSeverity.CRITICAL, {
      component: 'database',
      ...context,
      operation: error.operation
    });
  }

  handleNetworkError(error: Error, endpoint?: string, context: ErrorContext = {}): StructuredError {
    return this.handleError(error, ErrorCategory.NETWORK, ErrorSeverity.MEDIUM, {
      operation: 'network_request',
      ...context,
      metadata: { ...context.metadata, endpoint }
    });
  }

  handleTimeoutError(error: TimeoutError, context: ErrorContext = {}): StructuredError {
    return this.handleError(error, ErrorCategory.TIMEOUT, ErrorSeverity.MEDIUM, {
      ...context,
      operation: error.operation,
      metadata: { ...context.metadata, timeoutMs: error.timeoutMs }
    });
  }

  handlePermissionError(action: string, context: ErrorContext = {}): StructuredError {
    return this.handleError(`Permission denied for action: ${action}`, ErrorCategory.PERMISSION, ErrorSeverity.HIGH, {
      ...context,
      operation: 'permission_check',
      metadata: { ...context.metadata, action }
    });
  }

  handleConfigurationError(message: string, source?: string, context: ErrorContext = {}): StructuredError {
    return this.handleError(message, ErrorCategory.CONFIGURATION, ErrorSeverity.MEDIUM, {
      operation: 'load_configuration',
      ...context,
      metadata: { ...context.metadata, source }
    });
  }

  /** A data file (configuration, classifier model) exists but could not be parsed. */
  handleParsingError(error: Error, source: string, context: ErrorContext = {}): StructuredError {
    return this.handleError(error, ErrorCategory.PARSING, ErrorSeverity.HIGH, {
      ...context,
      metadata: { ...context.metadata, source }
    });
  }

  resolveError(errorId: string, resolution: string): boolean {
    const error = this.errors.get(errorId);
    if (!error || error.resolved) {
      return false;
    }

    error.resolved = true;
    error.resolution = resolution;
    this.logger.info('Error resolved', { errorId, resolution, category: error.category });
    return true;
  }

  getError(errorId: string): StructuredError | undefined {
    return this.errors.get(errorId);
  }

  /** Matching errors, newest first. */
  getErrors(filters: ErrorFilters = {}): StructuredError[] {
    const { category, severity, resolved, since, limit } = filters;

    const matches = Array.from(this.errors.values())
      .filter(e =>
        (category === undefined || e.category === category) &&
        (severity === undefined || e.severity === severity) &&
        (resolved === undefined || e.resolved === resolved) &&
        (since === undefined || e.timestamp >= since)
      )
      .reverse();

    return limit ? matches.slice(0, limit) : matches;
  }

  getErrorStats(): ErrorStats {
    const stats: ErrorStats = {
      total: 0,
      unresolved: 0,
      byCategory: {
        [ErrorCategory.DATABASE]: 0,
        [ErrorCategory.NETWORK]: 0,
        [ErrorCategory.CONFIGURATION]: 0,
        [ErrorCategory.PERMISSION]: 0,
        [ErrorCategory.PARSING]: 0,
        [ErrorCategory.TIMEOUT]: 0,
        [ErrorCategory.UNKNOWN]: 0
      },
      bySeverity: {
        [ErrorSeverity.LOW]: 0,
        [ErrorSeverity.MEDIUM]: 0,
        [ErrorSeverity.HIGH]: 0,
        [ErrorSeverity.CRITICAL]: 0
      }
    };

    for (const error of this.errors.values()) {
      stats.total++;
      if (!error.resolved) stats.unresolved++;
      stats.byCategory[error.category]++;
      stats.bySeverity[error.severity]++;
    }

    return stats;
  }

  onError(severity: ErrorSeverity, callback: ErrorCallback): void {
    this.callbacks.set(severity, [...(this.callbacks.get(severity) ?? []), callback]);
  }

  /**
   * Route uncaught exceptions and unhandled rejections through this handler.
   * Only the process entry point should call this.
   */
  installProcessHandlers(): void {
    if (this.processHandlersInstalled) {
      return;
    }
    this.processHandlersInstalled = true;

    process.on('uncaughtException', (error: Error) => {
      this.handleError(error, ErrorCategory.UNKNOWN, ErrorSeverity.CRITICAL, {
        component: 'process',
        operation: 'uncaught_exception'
      });
    });

    process.on('unhandledRejection', (reason: unknown) => {
      this.handleError(
        reason instanceof Error ? reason : new Error(String(reason)),
        ErrorCategory.UNKNOWN,
        ErrorSeverity.HIGH,
        { component: 'process', operation: 'unhandled_rejection' }
      );
    });
  }

  destroy(): void {
    this.callbacks.clear();
    this.errors.clear();
  }

  // Map iteration follows insertion order, so the first key is the oldest.
  private remember(record: StructuredError): void {
    this.errors.set(record.id, record);

    while (this.errors.size > this.maxErrorHistory) {
      const oldest = this.errors.keys().next();
      if (oldest.done) break;
      this.errors.delete(oldest.value);
    }
  }

  private log(record: StructuredError): void {
    const data: LogContext = {
      errorId: record.id,
      category: record.category,
      context: record.context
    };
    if (LOG_METHOD[record.severity] === 'error') {
      data['stack'] = record.stackTrace;
    }

    this.logger[LOG_METHOD[record.severity]](`[${record.severity.toUpperCase()}] ${record.message}`, data);
  }

  private notify(record: StructuredError): void {
    for (const callback of this.callbacks.get(record.severity) ?? []) {
      try {
        callback(record);
      } catch (callbackError) {
        this.logger.error('Error in error callback', {
          callbackError: String(callbackError),
          originalErrorId: record.id
        });
      }
    }
  }
}
