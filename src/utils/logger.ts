/**
 * Centralized Logging System for texweave
 *
 * Provides structured logging with:
 * - Log levels (DEBUG, INFO, WARN, ERROR)
 * - stderr output, so command results on stdout stay clean
 * - Rotating JSON-lines file logs
 * - Module-scoped loggers
 */

import * as fs from 'fs';
import * as path from 'path';
import { format } from 'date-fns';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

/**
 * Map string config values to LogLevel
 */
const LOG_LEVEL_MAP: Record<string, LogLevel> = {
    'debug': LogLevel.DEBUG,
    'info': LogLevel.INFO,
    'warn': LogLevel.WARN,
    'error': LogLevel.ERROR
};

/**
 * Parse a level name, returning undefined for unknown names
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (!value) {
        return undefined;
    }
    return LOG_LEVEL_MAP[value.trim().toLowerCase()];
}

/**
 * One line of the JSON log file
 */
export interface LogRecord {
    timestamp: string;
    level: string;
    module: string;
    message: string;
    data?: object;
}

/**
 * Size-based rotating file handler
 *
 * Writes one JSON record per line and rotates when the file exceeds maxBytes.
 * Keeps up to backupCount rotated files (texweave.log.1, texweave.log.2, etc.)
 */
export class RotatingFileHandler {
    private maxBytes: number;
    private backupCount: number;
    private currentSize: number = 0;
    private initialized: boolean = false;

    constructor(
        private logPath: string,
        maxBytes: number = 1024 * 1024, // 1MB default
        backupCount: number = 3
    ) {
        this.maxBytes = maxBytes;
        this.backupCount = backupCount;
    }

    /**
     * Initialize the file handler
     */
    initialize(): void {
        if (this.initialized) return;

        fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
        try {
            this.currentSize = fs.statSync(this.logPath).size;
        } catch {
            this.currentSize = 0;
        }
        this.initialized = true;
    }

    /**
     * Write a log entry, rotating if necessary
     *
     * Appends synchronously: a CLI run may exit right after its last log call.
     */
    write(message: string): void {
        if (!this.initialized) {
            return;
        }

        const entry = message + '\n';
        const entrySize = Buffer.byteLength(entry, 'utf8');

        if (this.currentSize + entrySize > this.maxBytes) {
            this.rotate();
        }

        fs.appendFileSync(this.logPath, entry, 'utf8');
        this.currentSize += entrySize;
    }

    /**
     * Rotate the log files
     * texweave.log -> texweave.log.1 -> texweave.log.2 -> ... -> deleted
     */
    private rotate(): void {
        fs.rmSync(`${this.logPath}.${this.backupCount}`, { force: true });

        // Shift existing backups: .2 -> .3, .1 -> .2, etc.
        for (let i = this.backupCount - 1; i >= 1; i--) {
            const src = `${this.logPath}.${i}`;
            if (fs.existsSync(src)) {
                fs.renameSync(src, `${this.logPath}.${i + 1}`);
            }
        }

        if (fs.existsSync(this.logPath)) {
            fs.renameSync(this.logPath, `${this.logPath}.1`);
        }

        this.currentSize = 0;
    }

    close(): void {
        this.initialized = false;
    }
}

/**
 * Options accepted by LoggingService.configure()
 */
export interface LoggingOptions {
    level?: LogLevel;
    logFile?: string;
    maxBytes?: number;
    backupCount?: number;
}

/**
 * Global logging state
 */
class LoggingService {
    private fileHandler: RotatingFileHandler | null = null;
    private configuredLevel: LogLevel = parseLogLevel(process.env.TEXWEAVE_LOG_LEVEL) ?? LogLevel.INFO;

    /**
     * Apply configuration. TEXWEAVE_LOG_LEVEL wins over options.level.
     */
    configure(options: LoggingOptions): void {
        const envLevel = parseLogLevel(process.env.TEXWEAVE_LOG_LEVEL);
        this.configuredLevel = envLevel ?? options.level ?? this.configuredLevel;

        if (options.logFile) {
            this.fileHandler?.close();
            this.fileHandler = new RotatingFileHandler(options.logFile, options.maxBytes, options.backupCount);
            try {
                this.fileHandler.initialize();
            } catch (error) {
                this.fileHandler = null;
                console.error('Failed to initialize log file handler:', error instanceof Error ? error.message : error);
            }
        }
    }

    /**
     * Force a level, ignoring the environment (used by --verbose)
     */
    setLevel(level: LogLevel): void {
        this.configuredLevel = level;
    }

    /**
     * Check if a log level should be output
     */
    shouldLog(level: LogLevel): boolean {
        // Errors are always logged regardless of configured level
        if (level === LogLevel.ERROR) {
            return true;
        }
        return level >= this.configuredLevel;
    }

    /**
     * Format a log message for the console
     */
    private formatMessage(level: LogLevel, module: string, message: string, data?: object): string {
        const timestamp = new Date().toISOString();
        const levelStr = LogLevel[level].padEnd(5);
        const dataStr = data ? ` ${JSON.stringify(data)}` : '';
        return `[${timestamp}] [${levelStr}] [${module}] ${message}${dataStr}`;
    }

    /**
     * Format a log record for the JSON-lines file
     */
    private formatRecord(level: LogLevel, module: string, message: string, data?: object): string {
        const record: LogRecord = {
            timestamp: format(new Date(), 'yyyy-MM-dd HH:mm:ss'),
            level: LogLevel[level],
            module,
            message,
        };
        if (data) {
            record.data = data;
        }
        return JSON.stringify(record);
    }

    /**
     * Log a message
     */
    log(level: LogLevel, module: string, message: string, data?: object): void {
        if (!this.shouldLog(level)) {
            return;
        }

        if (this.fileHandler) {
            try {
                this.fileHandler.write(this.formatRecord(level, module, message, data));
            } catch (error) {
                // Drop the file handler so a broken disk does not fail every log call
                this.fileHandler = null;
                console.error('Failed to write log file:', error instanceof Error ? error.message : error);
            }
        }

        console.error(this.formatMessage(level, module, message, data));
    }

    /**
     * Log an error, with its stack when debugging
     */
    logError(module: string, message: string, error?: Error, data?: object): void {
        this.log(LogLevel.ERROR, module, message, error ? { ...data, error: error.message } : data);

        if (error?.stack && this.configuredLevel === LogLevel.DEBUG) {
            console.error(`  Stack: ${error.stack}`);
        }
    }

    dispose(): void {
        if (this.fileHandler) {
            this.fileHandler.close();
            this.fileHandler = null;
        }
    }
}

// Global singleton instance
const loggingService = new LoggingService();

/**
 * Get the logging service instance
 */
export function getLoggingService(): LoggingService {
    return loggingService;
}

/**
 * Module-scoped logger for convenient logging
 */
export class Logger {
    constructor(private module: string) {}

    /**
     * Log a debug message (only when log level is DEBUG)
     */
    debug(message: string, data?: object): void {
        loggingService.log(LogLevel.DEBUG, this.module, message, data);
    }

    info(message: string, data?: object): void {
        loggingService.log(LogLevel.INFO, this.module, message, data);
    }

    warn(message: string, data?: object): void {
        loggingService.log(LogLevel.WARN, this.module, message, data);
    }

    /**
     * Log an error message with optional Error object
     * Errors are logged at every level
     */
    error(message: string, error?: Error, data?: object): void {
        loggingService.logError(this.module, message, error, data);
    }

    /**
     * Create a child logger with a sub-module name
     */
    child(subModule: string): Logger {
        return new Logger(`${this.module}:${subModule}`);
    }
}

/**
 * Create a logger for a module
 */
export function createLogger(module: string): Logger {
    return new Logger(module);
}

// Pre-created loggers for common modules
export const cliLogger = createLogger('CLI');
export const composeLogger = createLogger('Compose');
export const buildLogger = createLogger('Build');
export const configLogger = createLogger('Config');
