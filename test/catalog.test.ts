import path from 'path';
import {
    RegisterCatalog,
    getRegisterSize,
    loadCatalog,
    loadDefaultCatalog,
    parseCatalog,
    planReadBlocks,
    type RegisterDescriptor,
} from '../src/catalog';
import { ConfigurationError, UnknownKeyError } from '../src/errors';

const base: RegisterDescriptor = {
    name: 'Supply Temperature',
    address: 100,
    words: 2,
    type: 'float32',
    scale: 1,
    offset: 0,
    access: 'read-only',
    kind: 'value',
};

describe('RegisterCatalog', () => {
    test('looks up descriptors by key', () => {
        const catalog = new RegisterCatalog({ supply_temperature: base });

        expect(catalog.lookup('supply_temperature')).toEqual(base);
        expect(catalog.has('supply_temperature')).toBe(true);
        expect(catalog.keys()).toEqual(['supply_temperature']);
        expect(catalog.size).toBe(1);
    });

    test('unknown keys raise UnknownKeyError', () => {
        const catalog = new RegisterCatalog({ supply_temperature: base });

        expect(() => catalog.lookup('nope')).toThrow(UnknownKeyError);
        expect(catalog.has('nope')).toBe(false);
    });

    test('descriptors are frozen', () => {
        const catalog = new RegisterCatalog({ supply_temperature: base });

        expect(Object.isFrozen(catalog.lookup('supply_temperature'))).toBe(true);
        expect(Object.isFrozen(catalog)).toBe(true);
    });

    test('rejects a word count that does not match the type', () => {
        expect(() => new RegisterCatalog({ bad: { ...base, words: 1 } })).toThrow(ConfigurationError);
    });

    test('rejects overlapping registers', () => {
        const make = () => new RegisterCatalog({
            supply_temperature: base,
            overlap: { ...base, name: 'Overlap', address: 101 },
        });
        expect(make).toThrow(ConfigurationError);
        expect(make).toThrow('Invalid overlap.address: register 101 is already used by "supply_temperature"');
    });

    test('rejects zero scale and inverted ranges', () => {
        expect(() => new RegisterCatalog({ bad: { ...base, scale: 0 } })).toThrow(ConfigurationError);
        expect(() => new RegisterCatalog({ bad: { ...base, range: [30, 5] } })).toThrow(ConfigurationError);
    });

    test('rejects addresses past the end of the address space', () => {
        expect(() => new RegisterCatalog({ bad: { ...base, address: 0xFFFF } })).toThrow(ConfigurationError);
        expect(() => new RegisterCatalog({ bad: { ...base, address: -1 } })).toThrow(ConfigurationError);
    });
});

describe('getRegisterSize', () => {
    test('16-bit types take one word, 32-bit types two', () => {
        expect(getRegisterSize('int16')).toBe(1);
        expect(getRegisterSize('uint16')).toBe(1);
        expect(getRegisterSize('int32')).toBe(2);
        expect(getRegisterSize('uint32')).toBe(2);
        expect(getRegisterSize('float32')).toBe(2);
    });
});

describe('parseCatalog', () => {
    test('fills in defaults', () => {
        const catalog = parseCatalog({ error_code: { address: 151, type: 'int16' } });

        expect(catalog.lookup('error_code')).toEqual({
            name: 'error_code',
            address: 151,
            words: 1,
            type: 'int16',
            scale: 1,
            offset: 0,
            access: 'read-only',
            kind: 'value',
            range: undefined,
            unit: undefined,
            step: undefined,
            writeAddress: undefined,
        });
    });

    test('keeps keys that collide with object internals', () => {
        const raw: unknown = JSON.parse('{"__proto__": {"address": 1, "type": "int16"}, "a": {"address": 2, "type": "int16"}}');
        const catalog = parseCatalog(raw);

        expect(catalog.keys()).toEqual(['__proto__', 'a']);
        expect(catalog.lookup('__proto__')).toMatchObject({ address: 1, type: 'int16' });
    });

    test('accepts a Map of descriptors', () => {
        const catalog = new RegisterCatalog(new Map([['supply_temperature', base]]));

        expect(catalog.lookup('supply_temperature')).toEqual(base);
    });

    test('rejects unknown data types', () => {
        expect(() => parseCatalog({ x: { address: 1, type: 'float64' } })).toThrow('Invalid x.type');
    });

    test('rejects malformed ranges', () => {
        expect(() => parseCatalog({ x: { address: 1, type: 'int16', range: [1] } })).toThrow('Invalid x.range');
    });

    test('rejects a non-object document', () => {
        expect(() => parseCatalog([])).toThrow(ConfigurationError);
        expect(() => parseCatalog(null)).toThrow(ConfigurationError);
    });
});

describe('loadCatalog', () => {
    test('loads the built-in register map', () => {
        const catalog = loadDefaultCatalog();

        expect(catalog.size).toBe(24);
        expect(catalog.lookup('target_room_temperature')).toMatchObject({
            address: 302,
            type: 'int16',
            scale: 0.1,
            access: 'read-write',
            range: [10, 30],
        });
        expect(catalog.lookup('pump_status')).toMatchObject({ kind: 'switch', access: 'read-only' });
    });

    test('a missing file is a configuration error', () => {
        expect(() => loadCatalog(path.join(__dirname, 'does-not-exist.json'))).toThrow(ConfigurationError);
    });
});

describe('planReadBlocks', () => {
    test('coalesces back to back registers of the built-in map', () => {
        const blocks = planReadBlocks(loadDefaultCatalog());

        expect(blocks.map(b => [b.address, b.words])).toEqual([
            [100, 5], [106, 2], [110, 3], [120, 2], [130, 4], [140, 4],
            [150, 2], [200, 4], [300, 3], [304, 1], [306, 1], [308, 4],
        ]);
        expect(blocks[0].entries.map(e => e.key)).toEqual(['supply_temperature', 'return_temperature', 'setpoint_temperature']);
    });

    test('splits blocks at the word limit', () => {
        const catalog = new RegisterCatalog({
            a: { ...base, address: 0 },
            b: { ...base, address: 2 },
            c: { ...base, address: 4 },
        });

        expect(planReadBlocks(catalog, 4).map(b => [b.address, b.words])).toEqual([[0, 4], [4, 2]]);
    });

    test('an empty catalog needs no reads', () => {
        expect(planReadBlocks(new RegisterCatalog({}))).toEqual([]);
    });
});
