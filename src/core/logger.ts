export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
    debug(msg: string, ...args: unknown[]): void;
    info(msg: string, ...args: unknown[]): void;
    success(msg: string, ...args: unknown[]): void;
    warn(msg: string, ...args: unknown[]): void;
    error(msg: string, ...args: unknown[]): void;
}

const LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export interface ConsoleLoggerOptions {
    level?: LogLevel;
    /** 'stderr' sends everything to stderr. Required under MCP stdio, where stdout is the protocol channel. */
    stream?: 'stdout' | 'stderr';
}

export class ConsoleLogger implements Logger {
    private readonly level: LogLevel;
    private readonly stream: 'stdout' | 'stderr';

    constructor(options: ConsoleLoggerOptions = {}) {
        this.level = options.level ?? 'info';
        this.stream = options.stream ?? 'stdout';
    }

    private enabled(level: LogLevel): boolean {
        return LEVELS[level] >= LEVELS[this.level];
    }

    private out(msg: string, args: unknown[]): void {
        if (this.stream === 'stderr') {
            console.error(msg, ...args);
        } else {
            console.log(msg, ...args);
        }
    }

    debug(msg: string, ...args: unknown[]): void {
        if (this.enabled('debug')) this.out(`[debug] ${msg}`, args);
    }

    info(msg: string, ...args: unknown[]): void {
        if (this.enabled('info')) this.out(msg, args);
    }

    success(msg: string, ...args: unknown[]): void {
        if (this.enabled('info')) this.out(`✓ ${msg}`, args);
    }

    warn(msg: string, ...args: unknown[]): void {
        if (this.enabled('warn')) console.warn(`⚠ ${msg}`, ...args);
    }

    error(msg: string, ...args: unknown[]): void {
        if (this.enabled('error')) console.error(msg, ...args);
    }
}

export class SilentLogger implements Logger {
    debug(): void {}
    info(): void {}
    success(): void {}
    warn(): void {}
    error(): void {}
}
