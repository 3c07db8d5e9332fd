export interface Logger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

export const nullLogger: Logger = {
    debug() { },
    info() { },
    warn() { },
    error() { },
};

export function createConsoleLogger(prefix = '[Heliotherm]'): Logger {
    return {
        debug: (message, ...meta) => console.debug(`${prefix} ${message}`, ...meta),
        info: (message, ...meta) => console.log(`${prefix} ${message}`, ...meta),
        warn: (message, ...meta) => console.warn(`${prefix} ${message}`, ...meta),
        error: (message, ...meta) => console.error(`${prefix} ${message}`, ...meta),
    };
}

/** The logging half of a Node-RED node */
export interface NodeLogTarget {
    debug(msg: unknown): void;
    log(msg: unknown): void;
    warn(msg: unknown): void;
    error(msg: unknown): void;
}

/**
 * Route log lines to a Node-RED node so they land in the runtime log
 * with the node's id
 */
export function createNodeLogger(node: NodeLogTarget): Logger {
    const format = (message: string, meta: unknown[]) =>
        meta.length === 0 ? message : `${message} ${meta.map(m => typeof m === 'string' ? m : JSON.stringify(m)).join(' ')}`;
    return {
        debug: (message, ...meta) => node.debug(format(message, meta)),
        info: (message, ...meta) => node.log(format(message, meta)),
        warn: (message, ...meta) => node.warn(format(message, meta)),
        error: (message, ...meta) => node.error(format(message, meta)),
    };
}
