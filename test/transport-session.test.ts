import { TransportSession } from '../src/transport-session';
import { ConnectionError, MalformedPayloadError, ProtocolError, TimeoutError } from '../src/errors';
import ModbusRTU from 'modbus-serial';

jest.mock('modbus-serial', () => jest.fn());

function socketError(code: string): Error {
    return Object.assign(new Error(`read ${code}`), { errno: code });
}

describe('TransportSession', () => {
    let session: TransportSession;
    let mockClient: {
        connectTCP: jest.Mock;
        setID: jest.Mock;
        setTimeout: jest.Mock;
        close: jest.Mock;
        readHoldingRegisters: jest.Mock;
        writeRegister: jest.Mock;
        writeRegisters: jest.Mock;
        isOpen: boolean;
    };

    beforeEach(() => {
        jest.clearAllMocks();

        mockClient = {
            connectTCP: jest.fn().mockResolvedValue(undefined),
            setID: jest.fn(),
            setTimeout: jest.fn(),
            close: jest.fn(),
            readHoldingRegisters: jest.fn().mockResolvedValue({ data: [1, 2], buffer: Buffer.alloc(4) }),
            writeRegister: jest.fn(),
            writeRegisters: jest.fn(),
            isOpen: true
        };

        (ModbusRTU as unknown as jest.Mock).mockImplementation(() => mockClient);

        session = new TransportSession({ host: '127.0.0.1', port: 502, unitId: 3, timeoutMs: 1000 });
    });

    test('connects lazily and reuses the connection', async () => {
        expect(ModbusRTU).not.toHaveBeenCalled();

        await expect(session.readWords(100, 2)).resolves.toEqual([1, 2]);
        await session.readWords(102, 2);

        expect(ModbusRTU).toHaveBeenCalledTimes(1);
        expect(mockClient.connectTCP).toHaveBeenCalledTimes(1);
        expect(mockClient.connectTCP).toHaveBeenCalledWith('127.0.0.1', { port: 502, timeout: 1000 });
        expect(mockClient.setTimeout).toHaveBeenCalledWith(1000);
        expect(mockClient.setID).toHaveBeenCalledWith(3);
        expect(mockClient.readHoldingRegisters).toHaveBeenNthCalledWith(1, 100, 2);
        expect(mockClient.readHoldingRegisters).toHaveBeenNthCalledWith(2, 102, 2);
        expect(session.isOpen).toBe(true);
    });

    test('queues requests sequentially', async () => {
        const order: string[] = [];
        mockClient.readHoldingRegisters.mockImplementation(async (address: number) => {
            order.push(`start${address}`);
            await new Promise(r => setTimeout(r, address === 1 ? 50 : 10));
            order.push(`end${address}`);
            return { data: [address], buffer: Buffer.alloc(2) };
        });

        // Fire both rapidly
        const p1 = session.readWords(1, 1);
        const p2 = session.readWords(2, 1);

        await expect(Promise.all([p1, p2])).resolves.toEqual([[1], [2]]);
        expect(order).toEqual(['start1', 'end1', 'start2', 'end2']);
    });

    test('reconnects once and retries after a connection error', async () => {
        mockClient.readHoldingRegisters
            .mockRejectedValueOnce(socketError('ECONNRESET'))
            .mockResolvedValueOnce({ data: [7, 8], buffer: Buffer.alloc(4) });

        await expect(session.readWords(100, 2)).resolves.toEqual([7, 8]);

        expect(mockClient.close).toHaveBeenCalledTimes(1);
        expect(mockClient.connectTCP).toHaveBeenCalledTimes(2);
        expect(mockClient.readHoldingRegisters).toHaveBeenCalledTimes(2);
    });

    test('propagates a second consecutive connection error', async () => {
        mockClient.readHoldingRegisters.mockRejectedValue(socketError('EPIPE'));

        const result = session.readWords(100, 2);

        await expect(result).rejects.toBeInstanceOf(ConnectionError);
        await expect(result).rejects.toMatchObject({ kind: 'ConnectionError', host: '127.0.0.1', port: 502 });
        expect(mockClient.readHoldingRegisters).toHaveBeenCalledTimes(2);
        expect(mockClient.connectTCP).toHaveBeenCalledTimes(2);
    });

    test('retries a timed out request once, then reports Timeout', async () => {
        const timedOut = Object.assign(new Error('Timed out'), { name: 'TransactionTimedOutError', errno: 'ETIMEDOUT' });
        mockClient.readHoldingRegisters.mockRejectedValue(timedOut);

        const result = session.readWords(100, 2);

        await expect(result).rejects.toBeInstanceOf(TimeoutError);
        await expect(result).rejects.toMatchObject({ kind: 'Timeout', timeout: 1000 });
        expect(mockClient.readHoldingRegisters).toHaveBeenCalledTimes(2);
    });

    test('reports device exceptions without retrying or dropping the connection', async () => {
        mockClient.readHoldingRegisters.mockRejectedValue(
            Object.assign(new Error('Modbus exception 2: Illegal data address'), { modbusCode: 2 })
        );

        const result = session.readWords(100, 2);

        await expect(result).rejects.toBeInstanceOf(ProtocolError);
        await expect(result).rejects.toMatchObject({ kind: 'ProtocolError', exceptionCode: 2 });
        expect(mockClient.readHoldingRegisters).toHaveBeenCalledTimes(1);
        expect(mockClient.close).not.toHaveBeenCalled();
    });

    test('retries once on the same socket when the device is busy', async () => {
        mockClient.readHoldingRegisters
            .mockRejectedValueOnce(Object.assign(new Error('Modbus exception 6: Slave device busy'), { modbusCode: 6 }))
            .mockResolvedValueOnce({ data: [3, 4], buffer: Buffer.alloc(4) });

        await expect(session.readWords(100, 2)).resolves.toEqual([3, 4]);
        expect(mockClient.readHoldingRegisters).toHaveBeenCalledTimes(2);
        expect(mockClient.connectTCP).toHaveBeenCalledTimes(1);
        expect(mockClient.close).not.toHaveBeenCalled();
    });

    test('gives up when the device stays busy', async () => {
        mockClient.readHoldingRegisters.mockRejectedValue(
            Object.assign(new Error('Modbus exception 6: Slave device busy'), { modbusCode: 6 })
        );

        await expect(session.readWords(100, 2)).rejects.toMatchObject({ kind: 'ProtocolError', exceptionCode: 6 });
        expect(mockClient.readHoldingRegisters).toHaveBeenCalledTimes(2);
    });

    test('rejects a response with the wrong word count', async () => {
        mockClient.readHoldingRegisters.mockResolvedValue({ data: [1], buffer: Buffer.alloc(2) });

        await expect(session.readWords(100, 2)).rejects.toBeInstanceOf(MalformedPayloadError);
        expect(mockClient.readHoldingRegisters).toHaveBeenCalledTimes(1);
    });

    test('fails with ConnectionError when the device cannot be reached', async () => {
        mockClient.connectTCP.mockRejectedValue(socketError('ECONNREFUSED'));

        await expect(session.readWords(100, 2)).rejects.toBeInstanceOf(ConnectionError);
        expect(mockClient.connectTCP).toHaveBeenCalledTimes(2);
        expect(mockClient.readHoldingRegisters).not.toHaveBeenCalled();
    });

    test('reconnects if client is not open', async () => {
        await session.readWords(100, 2);
        expect(mockClient.connectTCP).toHaveBeenCalledTimes(1);

        // Simulate closed connection
        mockClient.isOpen = false;

        await session.readWords(100, 2);
        expect(mockClient.connectTCP).toHaveBeenCalledTimes(2);
    });

    test('writes a single word with function 6 and checks the echo', async () => {
        mockClient.writeRegister.mockResolvedValue({ address: 102, value: 225 });

        await expect(session.writeWords(102, [225])).resolves.toBeUndefined();
        expect(mockClient.writeRegister).toHaveBeenCalledWith(102, 225);
        expect(mockClient.writeRegisters).not.toHaveBeenCalled();
    });

    test('writes several words with function 16', async () => {
        mockClient.writeRegisters.mockResolvedValue({ address: 300, length: 2 });

        await session.writeWords(300, [0x41B4, 0x0000]);
        expect(mockClient.writeRegisters).toHaveBeenCalledWith(300, [0x41B4, 0x0000]);
    });

    test('treats a mismatched acknowledgement as a protocol error', async () => {
        mockClient.writeRegister.mockResolvedValue({ address: 102, value: 0 });

        await expect(session.writeWords(102, [225])).rejects.toBeInstanceOf(ProtocolError);
    });

    test('close releases the socket', async () => {
        await session.readWords(100, 2);
        await session.close();

        expect(mockClient.close).toHaveBeenCalledTimes(1);
        expect(session.isOpen).toBe(false);
    });
});
