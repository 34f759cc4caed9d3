export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
}

export const isLogLevel = (value: unknown): value is LogLevel =>
    typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value)

export interface Logger {
    debug: (...args: unknown[]) => void
    info: (...args: unknown[]) => void
    warn: (...args: unknown[]) => void
    error: (...args: unknown[]) => void
    /** Plain output, printed regardless of level (menus, results). */
    print: (...args: unknown[]) => void
}

export interface LoggerOptions {
    level?: LogLevel
    output?: Pick<Console, 'log' | 'warn' | 'error'>
}

/**
 * Console logger with a scope prefix and a level threshold.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
    const threshold = LEVEL_ORDER[options.level ?? 'info']
    const out = options.output ?? console
    const prefix = `[${scope}]`

    const enabled = (level: Exclude<LogLevel, 'silent'>): boolean =>
        LEVEL_ORDER[level] >= threshold

    return {
        debug: (...args) => {
            if (enabled('debug')) out.log(prefix, ...args)
        },
        info: (...args) => {
            if (enabled('info')) out.log(prefix, ...args)
        },
        warn: (...args) => {
            if (enabled('warn')) out.warn(prefix, ...args)
        },
        error: (...args) => {
            if (enabled('error')) out.error(prefix, ...args)
        },
        print: (...args) => {
            out.log(...args)
        },
    }
}
