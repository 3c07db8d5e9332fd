/**
 * Register Catalog
 * Immutable mapping from semantic key to register descriptor
 */

import fs from 'fs-extra';
import path from 'path';
import * as CONST from './constants';
import { ConfigurationError, UnknownKeyError } from './errors';

export type DataType = 'int16' | 'uint16' | 'int32' | 'uint32' | 'float32';
export type Access = 'read-only' | 'read-write';
export type RegisterKind = 'value' | 'switch';

export const DATA_TYPES: readonly DataType[] = ['int16', 'uint16', 'int32', 'uint32', 'float32'];

export interface RegisterDescriptor {
    readonly name: string;
    readonly address: number;
    readonly words: 1 | 2;
    readonly type: DataType;
    readonly scale: number;
    readonly offset: number;
    readonly access: Access;
    readonly kind: RegisterKind;
    /** [min, max] in display units */
    readonly range?: readonly [number, number];
    readonly unit?: string;
    readonly step?: number;
    /** Write target when it differs from the read address (switches) */
    readonly writeAddress?: number;
}

export interface CatalogEntry {
    readonly key: string;
    readonly descriptor: RegisterDescriptor;
}

/** One coalesced holding-register read */
export interface ReadBlock {
    readonly address: number;
    readonly words: number;
    readonly entries: readonly CatalogEntry[];
}

export const DEFAULT_CATALOG_PATH = path.join(__dirname, '..', 'registers', 'heliotherm.json');

/**
 * Number of 16-bit words a data type occupies
 */
export function getRegisterSize(type: DataType): 1 | 2 {
    return type === 'int16' || type === 'uint16' ? CONST.REG_SIZE_16 : CONST.REG_SIZE_32;
}

export class RegisterCatalog {
    private readonly registers: ReadonlyMap<string, RegisterDescriptor>;

    constructor(entries: Record<string, RegisterDescriptor> | ReadonlyMap<string, RegisterDescriptor>) {
        const registers = new Map<string, RegisterDescriptor>();
        for (const [key, descriptor] of isDescriptorMap(entries) ? entries : Object.entries(entries)) {
            validateDescriptor(key, descriptor);
            registers.set(key, Object.freeze({ ...descriptor }));
        }
        checkOverlaps(registers);
        this.registers = registers;
        Object.freeze(this);
    }

    /**
     * @throws {UnknownKeyError} when the key is absent
     */
    lookup(key: string): RegisterDescriptor {
        const descriptor = this.registers.get(key);
        if (!descriptor) throw new UnknownKeyError(key);
        return descriptor;
    }

    has(key: string): boolean {
        return this.registers.has(key);
    }

    keys(): string[] {
        return [...this.registers.keys()];
    }

    entries(): CatalogEntry[] {
        return [...this.registers.entries()].map(([key, descriptor]) => ({ key, descriptor }));
    }

    get size(): number {
        return this.registers.size;
    }
}

/**
 * Group catalog entries into the fewest reads: entries whose registers are
 * back to back share one request, up to `maxWords` per request.
 */
export function planReadBlocks(catalog: RegisterCatalog, maxWords = CONST.MAX_READ_WORDS): ReadBlock[] {
    const sorted = catalog.entries().sort((a, b) => a.descriptor.address - b.descriptor.address);
    const blocks: ReadBlock[] = [];

    let current: { address: number; words: number; entries: CatalogEntry[] } | null = null;
    for (const entry of sorted) {
        const { address, words } = entry.descriptor;
        if (current && current.address + current.words === address && current.words + words <= maxWords) {
            current.words += words;
            current.entries.push(entry);
            continue;
        }
        if (current) blocks.push(current);
        current = { address, words, entries: [entry] };
    }
    if (current) blocks.push(current);

    return blocks;
}

/**
 * Load a catalog from a JSON file of `{ key: descriptor }`
 */
export function loadCatalog(filePath: string): RegisterCatalog {
    let raw: unknown;
    try {
        raw = fs.readJsonSync(filePath);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError('catalog', `cannot read ${filePath}: ${reason}`);
    }
    return parseCatalog(raw);
}

export function loadDefaultCatalog(): RegisterCatalog {
    return loadCatalog(DEFAULT_CATALOG_PATH);
}

/**
 * Build a catalog from untyped data (parsed JSON). Omitted fields take
 * their defaults: words from the type, scale 1, offset 0, read-only, kind value.
 */
export function parseCatalog(raw: unknown): RegisterCatalog {
    if (!isRecord(raw)) throw new ConfigurationError('catalog', 'expected an object of register descriptors');

    // A Map keeps keys such as "__proto__" as ordinary entries
    const entries = new Map<string, RegisterDescriptor>();
    for (const [key, value] of Object.entries(raw)) {
        entries.set(key, parseDescriptor(key, value));
    }
    return new RegisterCatalog(entries);
}

function parseDescriptor(key: string, raw: unknown): RegisterDescriptor {
    if (!isRecord(raw)) throw new ConfigurationError(key, 'descriptor must be an object');

    const type = raw.type;
    if (!isDataType(type)) throw new ConfigurationError(`${key}.type`, `expected one of ${DATA_TYPES.join(', ')}`);

    const words = raw.words ?? getRegisterSize(type);
    if (words !== 1 && words !== 2) throw new ConfigurationError(`${key}.words`, 'must be 1 or 2');

    const access = raw.access ?? 'read-only';
    if (access !== 'read-only' && access !== 'read-write') {
        throw new ConfigurationError(`${key}.access`, 'must be "read-only" or "read-write"');
    }

    const kind = raw.kind ?? 'value';
    if (kind !== 'value' && kind !== 'switch') throw new ConfigurationError(`${key}.kind`, 'must be "value" or "switch"');

    let range: [number, number] | undefined;
    if (raw.range !== undefined) {
        const r = raw.range;
        if (!Array.isArray(r) || r.length !== 2 || typeof r[0] !== 'number' || typeof r[1] !== 'number') {
            throw new ConfigurationError(`${key}.range`, 'must be [min, max]');
        }
        range = [r[0], r[1]];
    }

    return {
        name: optionalString(key, raw, 'name') ?? key,
        address: requiredNumber(key, raw, 'address'),
        words,
        type,
        scale: optionalNumber(key, raw, 'scale') ?? 1,
        offset: optionalNumber(key, raw, 'offset') ?? 0,
        access,
        kind,
        range,
        unit: optionalString(key, raw, 'unit'),
        step: optionalNumber(key, raw, 'step'),
        writeAddress: optionalNumber(key, raw, 'writeAddress'),
    };
}

function validateDescriptor(key: string, d: RegisterDescriptor): void {
    if (!key) throw new ConfigurationError('catalog', 'register key must not be empty');
    if (!isAddress(d.address)) throw new ConfigurationError(`${key}.address`, `${d.address} is not a register address`);
    if (d.words !== getRegisterSize(d.type)) {
        throw new ConfigurationError(`${key}.words`, `${d.type} occupies ${getRegisterSize(d.type)} word(s), not ${d.words}`);
    }
    if (d.address + d.words - 1 > CONST.MAX_ADDRESS) {
        throw new ConfigurationError(`${key}.address`, 'register runs past the end of the address space');
    }
    if (!Number.isFinite(d.scale) || d.scale === 0) throw new ConfigurationError(`${key}.scale`, 'must be a non-zero number');
    if (!Number.isFinite(d.offset)) throw new ConfigurationError(`${key}.offset`, 'must be a finite number');
    if (d.range && !(d.range[0] <= d.range[1])) throw new ConfigurationError(`${key}.range`, 'min must not exceed max');
    if (d.writeAddress !== undefined && !isAddress(d.writeAddress)) {
        throw new ConfigurationError(`${key}.writeAddress`, `${d.writeAddress} is not a register address`);
    }
}

function checkOverlaps(registers: ReadonlyMap<string, RegisterDescriptor>): void {
    const owners = new Map<number, string>();
    for (const [key, d] of registers) {
        for (let a = d.address; a < d.address + d.words; a++) {
            const owner = owners.get(a);
            if (owner !== undefined) {
                throw new ConfigurationError(`${key}.address`, `register ${a} is already used by "${owner}"`);
            }
            owners.set(a, key);
        }
    }
}

function isDescriptorMap(
    entries: Record<string, RegisterDescriptor> | ReadonlyMap<string, RegisterDescriptor>,
): entries is ReadonlyMap<string, RegisterDescriptor> {
    return entries instanceof Map;
}

function isAddress(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value <= CONST.MAX_ADDRESS;
}

function isDataType(value: unknown): value is DataType {
    return typeof value === 'string' && DATA_TYPES.some(t => t === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requiredNumber(key: string, raw: Record<string, unknown>, field: string): number {
    const value = raw[field];
    if (typeof value !== 'number') throw new ConfigurationError(`${key}.${field}`, 'must be a number');
    return value;
}

function optionalNumber(key: string, raw: Record<string, unknown>, field: string): number | undefined {
    const value = raw[field];
    if (value === undefined) return undefined;
    if (typeof value !== 'number') throw new ConfigurationError(`${key}.${field}`, 'must be a number');
    return value;
}

function optionalString(key: string, raw: Record<string, unknown>, field: string): string | undefined {
    const value = raw[field];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') throw new ConfigurationError(`${key}.${field}`, 'must be a string');
    return value;
}
