import ModbusRTU from 'modbus-serial';
import * as CONST from './constants';
import {
    ConnectionError,
    MalformedPayloadError,
    ProtocolError,
    TimeoutError,
    isTransportError,
    type TransportError,
} from './errors';
import { nullLogger, type Logger } from './logger';
import { TaskQueue } from './task-queue';
import { describeError, hasProperty, withTimeout } from './utils';

/**
 * Request/response access to the device's holding registers
 */
export interface RegisterTransport {
    readWords(address: number, count: number): Promise<number[]>;
    writeWords(address: number, words: readonly number[]): Promise<void>;
    close(): Promise<void>;
}

export interface TransportOptions {
    host: string;
    port: number;
    unitId: number;
    timeoutMs: number;
}

/**
 * Owns the single Modbus TCP connection to the controller.
 *
 * 1. The socket is opened on first use and reused afterwards.
 * 2. Requests are serialized in arrival order; one is on the wire at a time.
 * 3. A connection failure or timeout drops the socket, reconnects once and
 *    retries the request once. A second failure goes to the caller.
 * 4. A busy-device exception is retried once on the same socket. Other
 *    exception responses go straight to the caller.
 */
export class TransportSession implements RegisterTransport {
    private client: ModbusRTU | null = null;
    private readonly queue = new TaskQueue();

    constructor(
        private readonly options: TransportOptions,
        private readonly logger: Logger = nullLogger,
    ) { }

    get isOpen(): boolean {
        return this.client !== null && this.client.isOpen;
    }

    readWords(address: number, count: number): Promise<number[]> {
        const operation = `read ${count} word(s) at ${address}`;
        return this.execute(operation, async (client) => {
            const res = await client.readHoldingRegisters(address, count);
            if (res.data.length !== count) {
                throw new MalformedPayloadError(count, res.data.length, operation);
            }
            return res.data;
        });
    }

    writeWords(address: number, words: readonly number[]): Promise<void> {
        const operation = `write ${words.length} word(s) at ${address}`;
        if (words.length === 0) {
            return Promise.reject(new MalformedPayloadError(1, 0, operation));
        }

        return this.execute(operation, async (client) => {
            if (words.length === 1) {
                const ack = await client.writeRegister(address, words[0]);
                if (ack.address !== address || ack.value !== words[0]) {
                    throw new ProtocolError(operation, null, `device acknowledged ${ack.value} at ${ack.address}`);
                }
                return;
            }

            const ack = await client.writeRegisters(address, [...words]);
            if (ack.address !== address || ack.length !== words.length) {
                throw new ProtocolError(operation, null, `device acknowledged ${ack.length} word(s) at ${ack.address}`);
            }
        });
    }

    /**
     * Wait for queued requests, then close the socket
     */
    async close(): Promise<void> {
        await this.queue.drain();
        if (this.client) {
            this.invalidate();
            this.logger.info(`Closed connection to ${this.options.host}:${this.options.port}`);
        }
    }

    private execute<T>(operation: string, action: (client: ModbusRTU) => Promise<T>): Promise<T> {
        return this.queue.run(async () => {
            try {
                return await this.attempt(operation, action);
            } catch (e) {
                if (e instanceof ConnectionError || e instanceof TimeoutError) {
                    this.logger.warn(`${operation} failed (${e.message}); reconnecting once`);
                } else if (isRetryableException(e)) {
                    this.logger.warn(`${operation} failed (${e.message}); retrying once`);
                } else {
                    throw e;
                }
                return await this.attempt(operation, action);
            }
        });
    }

    private async attempt<T>(operation: string, action: (client: ModbusRTU) => Promise<T>): Promise<T> {
        const client = await this.acquire();
        try {
            return await withTimeout(action(client), this.options.timeoutMs, operation);
        } catch (e) {
            const error = this.classify(e, operation);
            if (error instanceof ConnectionError || error instanceof TimeoutError) {
                // A late answer would desync the next request; start over on a fresh socket
                this.invalidate();
            }
            throw error;
        }
    }

    private async acquire(): Promise<ModbusRTU> {
        if (this.client && this.client.isOpen) return this.client;

        const { host, port, unitId, timeoutMs } = this.options;
        this.invalidate();

        const client = new ModbusRTU();
        client.setTimeout(timeoutMs);
        try {
            this.logger.debug(`Connecting to ${host}:${port}...`);
            await withTimeout(client.connectTCP(host, { port, timeout: timeoutMs }), timeoutMs, `connect ${host}:${port}`);
        } catch (e) {
            this.closeClient(client);
            throw new ConnectionError(host, port, describeError(e));
        }

        client.setID(unitId);
        this.client = client;
        this.logger.info(`Connected to ${host}:${port} (unit ${unitId})`);
        return client;
    }

    private classify(error: unknown, operation: string): TransportError {
        if (isTransportError(error)) return error;

        if (hasProperty(error, 'modbusCode') && typeof error.modbusCode === 'number') {
            return new ProtocolError(operation, error.modbusCode);
        }

        const description = describeError(error);
        if (isTimeout(error)) {
            return new TimeoutError(operation, this.options.timeoutMs);
        }
        if (CONST.FATAL_SOCKET_ERRORS.some(code => description.includes(code))) {
            return new ConnectionError(this.options.host, this.options.port, description);
        }
        return new ProtocolError(operation, null, description);
    }

    private invalidate(): void {
        const client = this.client;
        this.client = null;
        if (client) this.closeClient(client);
    }

    private closeClient(client: ModbusRTU): void {
        try {
            client.close(() => undefined);
        } catch (e) {
            this.logger.debug(`Ignoring close failure: ${describeError(e)}`);
        }
    }
}

function isRetryableException(error: unknown): error is ProtocolError {
    return error instanceof ProtocolError
        && error.exceptionCode !== null
        && CONST.RETRYABLE_EXCEPTIONS.includes(error.exceptionCode);
}

function isTimeout(error: unknown): boolean {
    if (hasProperty(error, 'errno') && error.errno === 'ETIMEDOUT') return true;
    if (hasProperty(error, 'code') && error.code === 'ETIMEDOUT') return true;
    return error instanceof Error && (error.name === 'TransactionTimedOutError' || /timed out/i.test(error.message));
}

export default TransportSession;
