/**
 * Heliotherm Utility Functions
 */

import { TimeoutError } from './errors';

/**
 * Race an operation against a timer. The operation itself is not aborted;
 * its late result is dropped.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(operationName, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([operation, timeoutPromise]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Parse a register key filter such as "supply_temperature, flow_rate"
 *
 * @returns {string[]|null} Keys in input order without duplicates, or null for "all"
 */
export function parseKeyList(keyStr: string | undefined): string[] | null {
    if (!keyStr || keyStr.trim() === '') {
        return null;
    }

    const keys = keyStr.split(',').map(s => s.trim()).filter(s => s.length > 0);
    return [...new Set(keys)];
}

/**
 * Parse a numeric editor field, falling back to a default for blanks
 */
export function parseNumber(raw: string | number | undefined, fallback: number): number {
    if (typeof raw === 'number') return raw;
    if (raw === undefined || raw.trim() === '') return fallback;
    return Number(raw);
}

export function hasProperty<K extends string>(value: unknown, key: K): value is Record<K, unknown> {
    return typeof value === 'object' && value !== null && key in value;
}

/**
 * One-line description of anything thrown
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        const code = hasProperty(error, 'errno') ? error.errno : hasProperty(error, 'code') ? error.code : undefined;
        const base = error.message || error.name;
        return typeof code === 'string' ? `${base} (${code})` : base;
    }
    return String(error);
}
