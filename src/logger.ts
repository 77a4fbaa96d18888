/**
 * Where owners report what they're doing.  Pass one in {@link OwnerOptions}
 * to see passes, discarded results and failures; by default nothing is
 * logged.
 *
 * @category Types and Interfaces
 */
export interface Logger {
    log(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * A {@link Logger} that discards everything
 *
 * @category Logging
 */
export const nullLogger: Logger = {
    log() {},
    info() {},
    warn() {},
    error() {},
};

/**
 * A {@link Logger} writing to the console, with each message prefixed
 *
 * @category Logging
 */
export function consoleLogger(prefix = "[derive-graph]"): Logger {
    return {
        log(message) { console.debug(`${prefix} ${message}`); },
        info(message) { console.info(`${prefix} ${message}`); },
        warn(message) { console.warn(`${prefix} [warn] ${message}`); },
        error(message) { console.error(`${prefix} [error] ${message}`); },
    };
}
