/**
 * Error kinds raised by the Heliotherm core.
 *
 * Every class carries a literal `kind` tag so callers can switch on it
 * without instanceof chains. There is no shared base class.
 */

import { MODBUS_EXCEPTION_NAMES } from './constants';

/**
 * Socket could not be opened, or broke during a request
 */
export class ConnectionError extends Error {
    public readonly kind = 'ConnectionError' as const;
    public host: string;
    public port: number;

    constructor(host: string, port: number, message: string) {
        super(`Connection failed to ${host}:${port}: ${message}`);
        this.name = 'ConnectionError';
        this.host = host;
        this.port = port;
    }
}

/**
 * No response within the configured bound
 */
export class TimeoutError extends Error {
    public readonly kind = 'Timeout' as const;
    public operation: string;
    public timeout: number;

    constructor(operation: string, timeout: number) {
        super(`Operation "${operation}" timed out after ${timeout}ms`);
        this.name = 'TimeoutError';
        this.operation = operation;
        this.timeout = timeout;
    }
}

/**
 * Device answered with a Modbus exception response, or an acknowledgement
 * that does not match the request
 */
export class ProtocolError extends Error {
    public readonly kind = 'ProtocolError' as const;
    public operation: string;
    public exceptionCode: number | null;

    constructor(operation: string, exceptionCode: number | null, detail?: string) {
        const reason = exceptionCode !== null
            ? MODBUS_EXCEPTION_NAMES[exceptionCode] ?? `UnknownException(${exceptionCode})`
            : detail ?? 'unexpected response';
        super(`Device rejected "${operation}": ${reason}`);
        this.name = 'ProtocolError';
        this.operation = operation;
        this.exceptionCode = exceptionCode;
    }
}

export class MalformedPayloadError extends Error {
    public readonly kind = 'MalformedPayload' as const;
    public expected: number;
    public received: number;

    constructor(expected: number, received: number, context: string) {
        super(`Expected ${expected} word(s) for ${context}, got ${received}`);
        this.name = 'MalformedPayloadError';
        this.expected = expected;
        this.received = received;
    }
}

/**
 * Value outside the declared range, or not representable in the register type
 */
export class ValueRangeError extends Error {
    public readonly kind = 'RangeError' as const;
    public value: number | boolean;

    constructor(value: number | boolean, message: string) {
        super(message);
        this.name = 'ValueRangeError';
        this.value = value;
    }
}

export class UnknownKeyError extends Error {
    public readonly kind = 'UnknownKey' as const;
    public key: string;

    constructor(key: string) {
        super(`Register "${key}" is not in the catalog`);
        this.name = 'UnknownKeyError';
        this.key = key;
    }
}

export class ReadOnlyViolationError extends Error {
    public readonly kind = 'ReadOnlyViolation' as const;
    public key: string;

    constructor(key: string) {
        super(`Register "${key}" is read-only`);
        this.name = 'ReadOnlyViolationError';
        this.key = key;
    }
}

export class WriteDisabledError extends Error {
    public readonly kind = 'WriteDisabled' as const;
    public key: string;

    constructor(key: string) {
        super(`Cannot write "${key}": coordinator is in read-only mode`);
        this.name = 'WriteDisabledError';
        this.key = key;
    }
}

/**
 * The caller gave up (abort signal) or the coordinator was closed
 */
export class CancelledError extends Error {
    public readonly kind = 'Cancelled' as const;
    public operation: string;

    constructor(operation: string, reason: string) {
        super(`Operation "${operation}" cancelled: ${reason}`);
        this.name = 'CancelledError';
        this.operation = operation;
    }
}

export class ConfigurationError extends Error {
    public readonly kind = 'Configuration' as const;
    public field: string;

    constructor(field: string, message: string) {
        super(`Invalid ${field}: ${message}`);
        this.name = 'ConfigurationError';
        this.field = field;
    }
}

export type TransportError = ConnectionError | TimeoutError | ProtocolError | MalformedPayloadError;

/** Ways a poll cycle can fail */
export type PollError = TransportError;

export type WriteError =
    | TransportError
    | ValueRangeError
    | UnknownKeyError
    | ReadOnlyViolationError
    | WriteDisabledError
    | CancelledError;

export function isTransportError(error: unknown): error is TransportError {
    return error instanceof ConnectionError
        || error instanceof TimeoutError
        || error instanceof ProtocolError
        || error instanceof MalformedPayloadError;
}
