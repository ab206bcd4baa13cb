import { z } from 'zod';
import { SpatialAnalysisError } from '../features/spatial/errors.js';
import type { SpatialErrorCode } from '../features/spatial/errors.js';
import { log } from '../lib/log.js';

// Error categories for better organization and handling
export enum ErrorCategory {
  FILE_SYSTEM = 'file_system',
  SPREADSHEET = 'spreadsheet',
  SNIPPET_MATCH = 'snippet_match',
  VALIDATION = 'validation',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown'
}

// Error severity levels
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

// User-facing message templates
const ERROR_MESSAGES: Record<ErrorCategory, { title: string; message: string; suggestions: string[] }> = {
  [ErrorCategory.FILE_SYSTEM]: {
    title: 'File System Error',
    message: 'The text file could not be read.',
    suggestions: ['Check the path to the text file', 'Check file permissions']
  },
  [ErrorCategory.SPREADSHEET]: {
    title: 'Snippet Source Error',
    message: 'The snippet spreadsheet could not be read, or the sheet or column is missing.',
    suggestions: ['Check the workbook path', 'Check the --sheet and --column names against the header row']
  },
  [ErrorCategory.SNIPPET_MATCH]: {
    title: 'Snippet Not Located',
    message: 'A snippet could not be anchored in the normalized text.',
    suggestions: ['Compare the snippet with the source text', 'Re-run with --skip-missing to list every unmatched snippet']
  },
  [ErrorCategory.VALIDATION]: {
    title: 'Data Validation Error',
    message: 'The provided data does not meet the required format or constraints.',
    suggestions: ['Review the data requirements', 'Correct any invalid entries']
  },
  [ErrorCategory.CONFIGURATION]: {
    title: 'Configuration Error',
    message: 'One or more settings are invalid.',
    suggestions: ['Check the command line flags', 'Check the JSON config file passed with --config']
  },
  [ErrorCategory.UNKNOWN]: {
    title: 'Unexpected Error',
    message: 'An unexpected error occurred.',
    suggestions: ['Re-run with SPARE_DEBUG=1 for stage timings']
  }
};

const CATEGORY_BY_CODE: Record<SpatialErrorCode, ErrorCategory> = {
  TEXT_SOURCE: ErrorCategory.FILE_SYSTEM,
  SNIPPET_SOURCE: ErrorCategory.SPREADSHEET,
  SNIPPET_NOT_FOUND: ErrorCategory.SNIPPET_MATCH,
  INDICATOR_OUT_OF_RANGE: ErrorCategory.SNIPPET_MATCH,
  CONFIGURATION: ErrorCategory.CONFIGURATION
};

export interface ErrorReport {
  id: string;
  timestamp: Date;
  category: ErrorCategory;
  severity: ErrorSeverity;
  originalError: Error;
  context?: Record<string, unknown>;
  userMessage: {
    title: string;
    message: string;
    suggestions: string[];
  };
  stackTrace?: string;
}

export interface ErrorReporterConfig {
  enableConsoleLogging?: boolean;
  maxStoredReports?: number;
}

export interface ErrorStats {
  totalErrors: number;
  errorsByCategory: Record<ErrorCategory, number>;
  errorsBySeverity: Record<ErrorSeverity, number>;
}

const ErrorReportSchema = z.object({
  id: z.string(),
  timestamp: z.date(),
  category: z.nativeEnum(ErrorCategory),
  severity: z.nativeEnum(ErrorSeverity),
  originalError: z.instanceof(Error),
  context: z.record(z.unknown()).optional(),
  userMessage: z.object({
    title: z.string(),
    message: z.string(),
    suggestions: z.array(z.string())
  }),
  stackTrace: z.string().optional()
});

/**
 * Collects error reports for a run and prints them in a readable form.
 */
export class ErrorReporter {
  private reports: ErrorReport[] = [];
  private config: Required<ErrorReporterConfig>;
  private counter = 0;

  constructor(config: ErrorReporterConfig = {}) {
    this.config = {
      enableConsoleLogging: true,
      maxStoredReports: 100,
      ...config
    };
  }

  report(
    error: Error,
    options: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
    } = {}
  ): ErrorReport {
    const category = options.category ?? this.categorizeError(error);
    const severity = options.severity ?? this.determineSeverity(category);
    const context = options.context ?? (error instanceof SpatialAnalysisError ? error.context : undefined);

    const report: ErrorReport = {
      id: `error-${Date.now()}-${++this.counter}`,
      timestamp: new Date(),
      category,
      severity,
      originalError: error,
      context,
      userMessage: ERROR_MESSAGES[category],
      stackTrace: error.stack
    };

    const check = ErrorReportSchema.safeParse(report);
    if (!check.success) {
      log.warn('error report failed validation:', check.error.message);
    }

    this.reports.push(report);
    if (this.reports.length > this.config.maxStoredReports) {
      this.reports = this.reports.slice(-this.config.maxStoredReports);
    }

    if (this.config.enableConsoleLogging) {
      this.logToConsole(report);
    }
    return report;
  }

  private categorizeError(error: Error): ErrorCategory {
    if (error instanceof SpatialAnalysisError) return CATEGORY_BY_CODE[error.code];
    if (error instanceof z.ZodError) return ErrorCategory.VALIDATION;
    if (error instanceof RangeError) return ErrorCategory.CONFIGURATION;
    return ErrorCategory.UNKNOWN;
  }

  private determineSeverity(category: ErrorCategory): ErrorSeverity {
    switch (category) {
      case ErrorCategory.UNKNOWN:
        return ErrorSeverity.CRITICAL;
      case ErrorCategory.FILE_SYSTEM:
      case ErrorCategory.SPREADSHEET:
        return ErrorSeverity.HIGH;
      case ErrorCategory.SNIPPET_MATCH:
      case ErrorCategory.CONFIGURATION:
        return ErrorSeverity.MEDIUM;
      default:
        return ErrorSeverity.LOW;
    }
  }

  private logToConsole(report: ErrorReport): void {
    log.error(`${report.userMessage.title} (${report.category}): ${report.originalError.message}`);
    log.info(report.userMessage.message);
    for (const s of report.userMessage.suggestions) log.info(`  • ${s}`);
    if (report.severity === ErrorSeverity.CRITICAL && report.stackTrace) {
      log.debug(report.stackTrace);
    }
  }

  getStats(): ErrorStats {
    const errorsByCategory = Object.values(ErrorCategory).reduce((acc, category) => {
      acc[category] = this.reports.filter(r => r.category === category).length;
      return acc;
    }, {} as Record<ErrorCategory, number>);

    const errorsBySeverity = Object.values(ErrorSeverity).reduce((acc, severity) => {
      acc[severity] = this.reports.filter(r => r.severity === severity).length;
      return acc;
    }, {} as Record<ErrorSeverity, number>);

    return { totalErrors: this.reports.length, errorsByCategory, errorsBySeverity };
  }

  getReports(filters?: { category?: ErrorCategory; severity?: ErrorSeverity }): ErrorReport[] {
    let filtered = this.reports;
    if (filters?.category) filtered = filtered.filter(r => r.category === filters.category);
    if (filters?.severity) filtered = filtered.filter(r => r.severity === filters.severity);
    return filtered;
  }

  clearReports(): void {
    this.reports = [];
  }
}

export const globalErrorReporter = new ErrorReporter({
  enableConsoleLogging: process.env.NODE_ENV !== 'test'
});

export function reportError(
  error: Error,
  options?: Parameters<ErrorReporter['report']>[1]
): ErrorReport {
  return globalErrorReporter.report(error, options);
}
