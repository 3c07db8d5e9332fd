/**
 * Message shaping shared by the Node-RED nodes
 */

import type { NodeMessage } from 'node-red';
import type { RegisterValue } from './codec';
import * as CONST from './constants';
import type { HeliothermConfig } from './config';
import type { ConnectionState, Snapshot } from './coordinator';
import { hasProperty, parseNumber } from './utils';

/** Editor fields of the config node; the editor stores everything as strings */
export interface ConfigNodeFields {
    host: string;
    port?: string;
    unitId?: string;
    readOnly?: boolean;
    scanInterval?: string;
    timeout?: string;
    failureThreshold?: string;
    catalogFile?: string;
}

export interface WriteRequest {
    key: string;
    value: RegisterValue;
}

export interface SnapshotMessage extends NodeMessage {
    topic: 'snapshot';
    payload: Record<string, RegisterValue>;
    sequence: number;
    timestamp: string;
}

export interface StatusBadge {
    fill: 'red' | 'green' | 'yellow' | 'blue' | 'grey';
    shape: 'ring' | 'dot';
    text: string;
}

export function toHeliothermConfig(fields: ConfigNodeFields): HeliothermConfig {
    return {
        host: fields.host,
        port: parseNumber(fields.port, CONST.DEFAULT_MODBUS_PORT),
        unitId: parseNumber(fields.unitId, CONST.DEFAULT_UNIT_ID),
        readOnly: fields.readOnly ?? true,
        scanInterval: parseNumber(fields.scanInterval, CONST.DEFAULT_SCAN_INTERVAL),
        timeout: parseNumber(fields.timeout, CONST.DEFAULT_TIMEOUT),
        failureThreshold: parseNumber(fields.failureThreshold, CONST.DEFAULT_FAILURE_THRESHOLD),
    };
}

/**
 * Snapshot as a flow message, limited to `keys` when given
 */
export function snapshotMessage(snapshot: Snapshot, keys: readonly string[] | null): SnapshotMessage {
    const payload: Record<string, RegisterValue> = {};
    for (const [key, value] of Object.entries(snapshot.values)) {
        if (!keys || keys.includes(key)) payload[key] = value;
    }
    return {
        topic: 'snapshot',
        payload,
        sequence: snapshot.sequence,
        timestamp: snapshot.timestamp.toISOString(),
    };
}

/**
 * Read `{ key, value }` out of msg.payload. Numeric strings are accepted
 * since dashboard widgets often send them.
 */
export function parseWriteRequest(payload: unknown): WriteRequest | null {
    if (!hasProperty(payload, 'key') || !hasProperty(payload, 'value')) return null;

    const { key, value } = payload;
    if (typeof key !== 'string' || key === '') return null;
    if (typeof value === 'number' || typeof value === 'boolean') return { key, value };
    if (typeof value === 'string' && value.trim() !== '' && !isNaN(Number(value))) {
        return { key, value: Number(value) };
    }
    return null;
}

export function stateBadge(state: ConnectionState, consecutiveFailures: number, snapshot: Snapshot | null): StatusBadge {
    switch (state) {
        case 'connected':
            return {
                fill: 'green',
                shape: 'dot',
                text: snapshot ? `#${snapshot.sequence} at ${snapshot.timestamp.toISOString().slice(11, 19)}` : 'connected',
            };
        case 'degraded':
            return { fill: 'yellow', shape: 'ring', text: `stale data (${consecutiveFailures} failed)` };
        case 'disconnected':
            return {
                fill: 'red',
                shape: 'ring',
                text: consecutiveFailures > 0 ? `unreachable (${consecutiveFailures} failed)` : 'disconnected',
            };
    }
}
