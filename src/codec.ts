/**
 * Value Codec
 * Converts holding-register words to display values and back.
 * 32-bit values are laid out high word first.
 */

import * as CONST from './constants';
import type { DataType, RegisterDescriptor } from './catalog';
import { MalformedPayloadError, ValueRangeError } from './errors';

export type RegisterValue = number | boolean;

const INTEGER_BOUNDS: Record<Exclude<DataType, 'float32'>, [number, number]> = {
    int16: [CONST.INT16_MIN, CONST.INT16_MAX],
    uint16: [0, CONST.UINT16_MAX],
    int32: [CONST.INT32_MIN, CONST.INT32_MAX],
    uint32: [0, CONST.UINT32_MAX],
};

/**
 * Combine words into the raw (unscaled) number for a data type
 */
export function wordsToRaw(words: readonly number[], type: DataType): number {
    const high = words[0] & 0xFFFF;
    switch (type) {
        case 'uint16':
            return high;
        case 'int16':
            return high >= 0x8000 ? high - 0x10000 : high;
        case 'uint32':
            return high * 0x10000 + (words[1] & 0xFFFF);
        case 'int32':
            return (high << 16) | (words[1] & 0xFFFF);
        case 'float32': {
            const buf = Buffer.alloc(4);
            buf.writeUInt16BE(high, 0);
            buf.writeUInt16BE(words[1] & 0xFFFF, 2);
            return buf.readFloatBE(0);
        }
    }
}

/**
 * Split a raw number into words. Integers must already be in range for the type.
 */
export function rawToWords(raw: number, type: DataType): number[] {
    switch (type) {
        case 'uint16':
            return [raw];
        case 'int16':
            return [raw & 0xFFFF];
        case 'uint32':
        case 'int32': {
            const bits = raw >>> 0;
            return [Math.floor(bits / 0x10000), bits & 0xFFFF];
        }
        case 'float32': {
            const buf = Buffer.alloc(4);
            buf.writeFloatBE(raw, 0);
            return [buf.readUInt16BE(0), buf.readUInt16BE(2)];
        }
    }
}

/**
 * Decode words into a display value: `raw * scale + offset`, or a boolean
 * for switch registers.
 *
 * @throws {MalformedPayloadError} when the word count does not match the descriptor
 */
export function decode(words: readonly number[], descriptor: RegisterDescriptor): RegisterValue {
    if (words.length !== descriptor.words) {
        throw new MalformedPayloadError(descriptor.words, words.length, `register ${descriptor.address}`);
    }

    const raw = wordsToRaw(words, descriptor.type);
    if (descriptor.kind === 'switch') return raw !== 0;

    const value = raw * descriptor.scale + descriptor.offset;
    if (descriptor.type === 'float32') return value;
    return roundTo(value, precisionOf(descriptor));
}

/**
 * Encode a display value into words for writing.
 *
 * @throws {ValueRangeError} when the value is outside the declared range or
 * does not fit the register type
 */
export function encode(value: RegisterValue, descriptor: RegisterDescriptor): number[] {
    if (typeof value === 'boolean') {
        if (descriptor.kind !== 'switch') {
            throw new ValueRangeError(value, `${descriptor.name} expects a number, got ${value}`);
        }
        return rawToWords(value ? 1 : 0, descriptor.type);
    }

    if (!Number.isFinite(value)) {
        throw new ValueRangeError(value, `${descriptor.name} expects a finite number, got ${value}`);
    }
    if (descriptor.kind === 'switch' && value !== 0 && value !== 1) {
        throw new ValueRangeError(value, `${descriptor.name} is a switch and only takes 0 or 1, got ${value}`);
    }
    if (descriptor.range) {
        const [min, max] = descriptor.range;
        if (value < min || value > max) {
            throw new ValueRangeError(value, `${value} is outside ${descriptor.name} range [${min}, ${max}]`);
        }
    }

    const scaled = (value - descriptor.offset) / descriptor.scale;
    if (descriptor.type === 'float32') {
        if (Math.abs(scaled) > CONST.FLOAT32_MAX) {
            throw new ValueRangeError(value, `${value} does not fit a float32 register`);
        }
        return rawToWords(scaled, 'float32');
    }

    const raw = Math.round(scaled);
    const [lo, hi] = INTEGER_BOUNDS[descriptor.type];
    if (raw < lo || raw > hi) {
        throw new ValueRangeError(value, `${value} does not fit a ${descriptor.type} register (raw ${raw})`);
    }
    if (descriptor.range) {
        // Rounding to the register step can land outside the range
        const [min, max] = descriptor.range;
        const stored = roundTo(raw * descriptor.scale + descriptor.offset, precisionOf(descriptor));
        if (stored < min || stored > max) {
            throw new ValueRangeError(value, `${value} would be stored as ${stored}, outside ${descriptor.name} range [${min}, ${max}]`);
        }
    }
    return rawToWords(raw, descriptor.type);
}

/**
 * Decimal places implied by scale and offset (0.1 -> 1, 0.25 -> 2)
 */
export function precisionOf(descriptor: Pick<RegisterDescriptor, 'scale' | 'offset'>): number {
    return Math.max(decimalPlaces(descriptor.scale), decimalPlaces(descriptor.offset));
}

function decimalPlaces(n: number): number {
    const text = String(n);
    if (text.includes('e-')) {
        const [mantissa, exponent] = text.split('e-');
        return decimalPlaces(Number(mantissa)) + parseInt(exponent, 10);
    }
    const dot = text.indexOf('.');
    return dot === -1 ? 0 : text.length - dot - 1;
}

function roundTo(value: number, decimals: number): number {
    return Number(value.toFixed(Math.min(decimals, 20)));
}
