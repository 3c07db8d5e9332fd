import * as CONST from './constants';
import { ConfigurationError } from './errors';

const MAX_TIMER_SECONDS = Math.floor(CONST.MAX_TIMER_MS / 1000);

/**
 * Options recognized by the coordinator. Durations are in seconds.
 */
export interface HeliothermConfig {
    host: string;
    port?: number;
    unitId?: number;
    readOnly?: boolean;
    scanInterval?: number;
    timeout?: number;
    failureThreshold?: number;
}

export interface ResolvedConfig {
    readonly host: string;
    readonly port: number;
    readonly unitId: number;
    readonly readOnly: boolean;
    readonly scanIntervalMs: number;
    readonly timeoutMs: number;
    readonly failureThreshold: number;
}

/**
 * Validate options and fill in defaults
 *
 * @throws {ConfigurationError} naming the first invalid field
 */
export function resolveConfig(input: HeliothermConfig): ResolvedConfig {
    const host = typeof input.host === 'string' ? input.host.trim() : '';
    if (!host) throw new ConfigurationError('host', 'a host name or IP address is required');

    const port = input.port ?? CONST.DEFAULT_MODBUS_PORT;
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new ConfigurationError('port', `${port} must be an integer between 1 and 65535`);
    }

    const unitId = input.unitId ?? CONST.DEFAULT_UNIT_ID;
    if (!Number.isInteger(unitId) || unitId < CONST.MIN_UNIT_ID || unitId > CONST.MAX_UNIT_ID) {
        throw new ConfigurationError('unitId', `${unitId} must be an integer between ${CONST.MIN_UNIT_ID} and ${CONST.MAX_UNIT_ID}`);
    }

    const scanInterval = input.scanInterval ?? CONST.DEFAULT_SCAN_INTERVAL;
    if (!isTimerSeconds(scanInterval)) {
        throw new ConfigurationError('scanInterval', `${scanInterval} must be a positive number of seconds up to ${MAX_TIMER_SECONDS}`);
    }

    const timeout = input.timeout ?? CONST.DEFAULT_TIMEOUT;
    if (!isTimerSeconds(timeout)) {
        throw new ConfigurationError('timeout', `${timeout} must be a positive number of seconds up to ${MAX_TIMER_SECONDS}`);
    }

    const failureThreshold = input.failureThreshold ?? CONST.DEFAULT_FAILURE_THRESHOLD;
    if (!Number.isInteger(failureThreshold) || failureThreshold < 1) {
        throw new ConfigurationError('failureThreshold', `${failureThreshold} must be an integer of at least 1`);
    }

    return {
        host,
        port,
        unitId,
        readOnly: input.readOnly ?? true,
        scanIntervalMs: scanInterval * 1000,
        timeoutMs: timeout * 1000,
        failureThreshold,
    };
}

function isTimerSeconds(seconds: number): boolean {
    return Number.isFinite(seconds) && seconds > 0 && seconds * 1000 <= CONST.MAX_TIMER_MS;
}
