export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

const colors = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    cyan: '\x1b[36m',
};

const levelColors: Record<LogLevel, string> = {
    debug: colors.dim,
    info: colors.green,
    warn: colors.yellow,
    error: colors.red,
};

const levelIcons: Record<LogLevel, string> = {
    debug: '🔍',
    info: '✅',
    warn: '⚠️',
    error: '❌',
};

const levelRank: Record<LogThreshold, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function isLogThreshold(value: string): value is LogThreshold {
    return Object.prototype.hasOwnProperty.call(levelRank, value);
}

export function parseLogThreshold(value: string | undefined, fallback: LogThreshold = 'info'): LogThreshold {
    if (value === undefined) return fallback;
    const normalized = value.trim().toLowerCase();
    return isLogThreshold(normalized) ? normalized : fallback;
}

// Shared by the root logger and every child
let threshold: LogThreshold = parseLogThreshold(process.env.LOG_LEVEL);

export function setLogLevel(level: LogThreshold): void {
    threshold = level;
}

export function getLogLevel(): LogThreshold {
    return threshold;
}

class Logger {
    private context: string;

    constructor(context: string = 'App') {
        this.context = context;
    }

    private log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (levelRank[level] < levelRank[threshold]) return;

        const timestamp = new Date().toISOString();
        const color = levelColors[level];
        const icon = levelIcons[level];
        const line = `${colors.dim}${timestamp}${colors.reset} ${icon} ${color}[${level.toUpperCase()}]${colors.reset} ${colors.cyan}[${this.context}]${colors.reset} ${message}`;

        if (level === 'error') {
            console.error(line, ...args);
        } else {
            console.log(line, ...args);
        }
    }

    debug(message: string, ...args: unknown[]): void {
        this.log('debug', message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        this.log('info', message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.log('warn', message, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        this.log('error', message, ...args);
    }

    child(context: string): Logger {
        return new Logger(`${this.context}:${context}`);
    }
}

export const logger = new Logger('Shardswap');
export { Logger };
