/**
 * pg-geopoint - Structured Logger
 *
 * Leveled logging with JSON details. Everything goes to stderr so the
 * stdio tool transport and CLI JSON output on stdout stay clean.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogEntry {
    level: LogLevel;
    message: string;
    timestamp: string;
    details?: Record<string, unknown> | undefined;
}

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

class Logger {
    private minLevel: LogLevel = 'info';

    private readonly levelPriority: Record<LogLevel, number> = {
        debug: 0,
        info: 1,
        warn: 2,
        error: 3
    };

    /**
     * Keys whose values never reach the log. Matched case-insensitively,
     * also as substrings (`tut_password`, `pgPassword`).
     */
    private readonly sensitiveKeys: readonly string[] = [
        'password',
        'secret',
        'token',
        'credential',
        'authorization',
        'connectionstring'
    ];

    setLevel(level: LogLevel): void {
        this.minLevel = level;
    }

    private shouldLog(level: LogLevel): boolean {
        return this.levelPriority[level] >= this.levelPriority[this.minLevel];
    }

    private sanitizeDetails(details: Record<string, unknown>): Record<string, unknown> {
        const sanitized: Record<string, unknown> = {};

        for (const [key, value] of Object.entries(details)) {
            const lowerKey = key.toLowerCase();
            const isSensitive = this.sensitiveKeys.some(sk => lowerKey.includes(sk));

            if (isSensitive && value !== undefined && value !== null) {
                sanitized[key] = '[REDACTED]';
            } else if (value instanceof Error) {
                sanitized[key] = value.message;
            } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
                sanitized[key] = this.sanitizeDetails(value as Record<string, unknown>);
            } else {
                sanitized[key] = value;
            }
        }

        return sanitized;
    }

    private formatEntry(entry: LogEntry): string {
        const base = `[${entry.timestamp}] [${entry.level.toUpperCase()}] ${entry.message}`;
        if (entry.details) {
            return `${base} ${JSON.stringify(this.sanitizeDetails(entry.details))}`;
        }
        return base;
    }

    private log(level: LogLevel, message: string, details?: Record<string, unknown>): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const formatted = this.formatEntry({
            level,
            message,
            timestamp: new Date().toISOString(),
            details
        });

        if (level === 'warn') {
            console.warn(formatted);
        } else {
            console.error(formatted);
        }
    }

    debug(message: string, details?: Record<string, unknown>): void {
        this.log('debug', message, details);
    }

    info(message: string, details?: Record<string, unknown>): void {
        this.log('info', message, details);
    }

    warn(message: string, details?: Record<string, unknown>): void {
        this.log('warn', message, details);
    }

    error(message: string, details?: Record<string, unknown>): void {
        this.log('error', message, details);
    }
}

export const logger = new Logger();
