export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

let globalLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    globalLevel = level;
}

export class Logger {
    constructor(private readonly context: string) {}

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[globalLevel];
    }

    private format(level: LogLevel, message: string): string {
        return `${new Date().toISOString()} [${level.toUpperCase().padEnd(5)}] [${this.context}] ${message}`;
    }

    debug(message: string, ...args: unknown[]): void {
        if (this.shouldLog('debug')) console.debug(this.format('debug', message), ...args);
    }

    info(message: string, ...args: unknown[]): void {
        if (this.shouldLog('info')) console.info(this.format('info', message), ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        if (this.shouldLog('warn')) console.warn(this.format('warn', message), ...args);
    }

    error(message: string, ...args: unknown[]): void {
        if (this.shouldLog('error')) console.error(this.format('error', message), ...args);
    }
}

export function createLogger(context: string): Logger {
    return new Logger(context);
}
