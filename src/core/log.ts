// Tagged console output in the `[TAG] message` style used across the node.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const COLORS = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    cyan: '\x1b[36m',
    reset: '\x1b[0m',
} as const;

export type Color = Exclude<keyof typeof COLORS, 'reset'>;

function isLogLevel(value: string): value is LogLevel {
    return value in LEVELS;
}

function threshold(): number {
    const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
    return LEVELS[isLogLevel(env) ? env : 'info'];
}

function emit(level: Exclude<LogLevel, 'silent'>, color: Color, tag: string, message: string): void {
    if (LEVELS[level] < threshold()) return;
    const line = `${COLORS[color]}[${tag}]${COLORS.reset} ${message}`;
    if (level === 'error' || level === 'warn') console.error(line);
    else console.log(line);
}

export const log = {
    debug: (tag: string, message: string) => emit('debug', 'cyan', tag, message),
    info: (tag: string, message: string, color: Color = 'cyan') => emit('info', color, tag, message),
    success: (tag: string, message: string) => emit('info', 'green', tag, message),
    warn: (tag: string, message: string) => emit('warn', 'yellow', tag, message),
    error: (tag: string, message: string) => emit('error', 'red', tag, message),
};

export const highlight = (value: string): string => `${COLORS.yellow}${value}${COLORS.reset}`;
