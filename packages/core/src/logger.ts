export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'none'];

type Severity = Exclude<LogLevel, 'none'>;

/**
 * A levelled console logger. Loggers form a tree: `child('geometry')` on a logger named `quadrant` gives one
 * named `quadrant:geometry`. A child follows its parent's level until it is given one of its own.
 */
export class Logger {
    private level: LogLevel | undefined;
    private readonly name: string;
    private readonly parent: Logger | undefined;

    constructor(name: string, level?: LogLevel, parent?: Logger) {
        this.name = name;
        this.level = level;
        this.parent = parent;
    }

    child(scope: string): Logger {
        return new Logger(`${this.name}:${scope}`, undefined, this);
    }

    getName(): string {
        return this.name;
    }

    setLevel(level: LogLevel) {
        this.level = level;
    }

    // forget a level set on this logger, going back to the parent's
    resetLevel() {
        this.level = undefined;
    }

    getLevel(): LogLevel {
        return this.level ?? this.parent?.getLevel() ?? 'info';
    }

    private shouldLog(severity: Severity): boolean {
        return LOG_LEVELS.indexOf(severity) >= LOG_LEVELS.indexOf(this.getLevel());
    }

    private formatMessage(severity: Severity, message: string): string {
        const timestamp = new Date().toISOString();
        return `[${timestamp}] [${this.name}] [${severity.toUpperCase()}] ${message}`;
    }

    private write(severity: Severity, message: string, optionalParams: unknown[]) {
        if (!this.shouldLog(severity)) {
            return;
        }
        const line = this.formatMessage(severity, message);
        switch (severity) {
            case 'debug':
                // biome-ignore lint/suspicious/noConsole: This is a logger
                console.debug(line, ...optionalParams);
                break;
            case 'info':
                // biome-ignore lint/suspicious/noConsole: This is a logger
                console.info(line, ...optionalParams);
                break;
            case 'warn':
                // biome-ignore lint/suspicious/noConsole: This is a logger
                console.warn(line, ...optionalParams);
                break;
            case 'error':
                // biome-ignore lint/suspicious/noConsole: This is a logger
                console.error(line, ...optionalParams);
                break;
        }
    }

    debug(message: string, ...optionalParams: unknown[]) {
        this.write('debug', message, optionalParams);
    }

    dir(obj: unknown, ...optionalParams: unknown[]) {
        if (this.shouldLog('debug')) {
            this.write('debug', 'See object below', optionalParams);
            // biome-ignore lint/suspicious/noConsole: This is a logger
            console.dir(obj);
        }
    }

    info(message: string, ...optionalParams: unknown[]) {
        this.write('info', message, optionalParams);
    }

    warn(message: string, ...optionalParams: unknown[]) {
        this.write('warn', message, optionalParams);
    }

    error(message: string, ...optionalParams: unknown[]) {
        this.write('error', message, optionalParams);
    }
}

export const logger = new Logger('quadrant');
