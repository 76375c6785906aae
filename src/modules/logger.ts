/**
 * Logger Module
 *
 * Named, level-filtered console logging shared by every module.
 *
 * Usage:
 *   const log = Logger.getLogger('package-assembler');
 *   log.info('Wrote', packageId);
 *
 * The level is global. It starts from the SAF_LOG_LEVEL environment variable
 * (debug | info | warn | error | none) and can be changed with Logger.setLevel().
 */

export const LogLevel = {
    DEBUG: 0,
    INFO: 1,
    WARN: 2,
    ERROR: 3,
    NONE: 4
} as const;

export type LogLevelValue = typeof LogLevel[keyof typeof LogLevel];

const LEVEL_NAMES: Record<string, LogLevelValue> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    none: LogLevel.NONE
};

export interface ModuleLogger {
    readonly name: string;
    debug(...args: unknown[]): void;
    info(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevelValue = LogLevel.INFO): LogLevelValue {
    if (!value) return fallback;
    return LEVEL_NAMES[value.trim().toLowerCase()] ?? fallback;
}

let currentLevel: LogLevelValue = parseLogLevel(process.env.SAF_LOG_LEVEL);
const loggers = new Map<string, ModuleLogger>();

function createLogger(name: string): ModuleLogger {
    const prefix = `[${name}]`;
    return {
        name,
        debug: (...args) => {
            if (currentLevel <= LogLevel.DEBUG) console.debug(prefix, ...args);
        },
        info: (...args) => {
            if (currentLevel <= LogLevel.INFO) console.info(prefix, ...args);
        },
        warn: (...args) => {
            if (currentLevel <= LogLevel.WARN) console.warn(prefix, ...args);
        },
        error: (...args) => {
            if (currentLevel <= LogLevel.ERROR) console.error(prefix, ...args);
        }
    };
}

export const Logger = {
    getLogger(name: string): ModuleLogger {
        let logger = loggers.get(name);
        if (!logger) {
            logger = createLogger(name);
            loggers.set(name, logger);
        }
        return logger;
    },

    setLevel(level: LogLevelValue | string): void {
        currentLevel = typeof level === 'string' ? parseLogLevel(level, currentLevel) : level;
    },

    getLevel(): LogLevelValue {
        return currentLevel;
    }
};
