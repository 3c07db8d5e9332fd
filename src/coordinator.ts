import { planReadBlocks, type ReadBlock, type RegisterCatalog, type RegisterDescriptor } from './catalog';
import { decode, encode, type RegisterValue } from './codec';
import { resolveConfig, type HeliothermConfig, type ResolvedConfig } from './config';
import {
    CancelledError,
    ConnectionError,
    ReadOnlyViolationError,
    UnknownKeyError,
    ValueRangeError,
    WriteDisabledError,
    isTransportError,
    type PollError,
    type TransportError,
    type WriteError,
} from './errors';
import { nullLogger, type Logger } from './logger';
import { TaskQueue } from './task-queue';
import { TransportSession, type RegisterTransport } from './transport-session';
import { describeError } from './utils';

export type ConnectionState = 'disconnected' | 'connected' | 'degraded';

/**
 * Decoded values from one successful poll cycle. Frozen once published.
 */
export interface Snapshot {
    readonly sequence: number;
    readonly timestamp: Date;
    readonly values: Readonly<Record<string, RegisterValue>>;
}

export interface CoordinatorStatus {
    readonly snapshot: Snapshot | null;
    readonly state: ConnectionState;
    readonly consecutiveFailures: number;
}

export type CoordinatorEvent =
    | { readonly type: 'snapshot'; readonly snapshot: Snapshot }
    | { readonly type: 'failure'; readonly error: PollError; readonly consecutiveFailures: number; readonly snapshot: Snapshot | null }
    | { readonly type: 'persistent-failure'; readonly error: PollError; readonly consecutiveFailures: number; readonly snapshot: Snapshot | null };

export type CoordinatorListener = (event: CoordinatorEvent) => void;

export type RefreshResult =
    | { readonly ok: true; readonly snapshot: Snapshot }
    | { readonly ok: false; readonly error: PollError | CancelledError };

export type WriteResult =
    | { readonly ok: true; readonly refresh: RefreshResult }
    | { readonly ok: false; readonly error: WriteError };

export interface OperationOptions {
    /** Caller-side cancellation; work already on the wire still completes */
    signal?: AbortSignal;
}

export interface CoordinatorOptions {
    config: HeliothermConfig | ResolvedConfig;
    catalog: RegisterCatalog;
    transport?: RegisterTransport;
    logger?: Logger;
}

/**
 * Polls the heat pump's register catalog, keeps the last good snapshot and
 * gates writes.
 *
 * Everything that touches the transport runs inside one serialized region,
 * so a poll cycle and a write never interleave on the link. Readers of the
 * published snapshot never wait on that region.
 */
export class PollingCoordinator {
    readonly config: ResolvedConfig;
    readonly catalog: RegisterCatalog;

    private readonly transport: RegisterTransport;
    private readonly logger: Logger;
    private readonly blocks: readonly ReadBlock[];
    private readonly exclusive = new TaskQueue();
    private readonly listeners = new Set<CoordinatorListener>();

    private snapshot: Snapshot | null = null;
    private state: ConnectionState = 'disconnected';
    private consecutiveFailures = 0;
    private sequence = 0;
    private timer: NodeJS.Timeout | null = null;
    private scheduledPending = false;
    private closed = false;

    constructor(options: CoordinatorOptions) {
        this.config = 'scanIntervalMs' in options.config ? options.config : resolveConfig(options.config);
        this.catalog = options.catalog;
        this.logger = options.logger ?? nullLogger;
        this.transport = options.transport ?? new TransportSession({
            host: this.config.host,
            port: this.config.port,
            unitId: this.config.unitId,
            timeoutMs: this.config.timeoutMs,
        }, this.logger);
        this.blocks = planReadBlocks(this.catalog);
    }

    /**
     * Run the first cycle and start the scan timer
     */
    start(): Promise<RefreshResult> {
        if (this.closed) return Promise.resolve(this.cancelled('start', 'coordinator is closed'));
        if (!this.timer) {
            this.timer = setInterval(() => this.scheduledPoll(), this.config.scanIntervalMs);
            this.logger.info(`Polling ${this.catalog.size} registers every ${this.config.scanIntervalMs / 1000}s`);
        }
        return this.requestRefresh();
    }

    /**
     * Stop the timer, let queued work finish, then release the connection
     */
    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        await this.exclusive.drain();
        await this.transport.close();
        this.state = 'disconnected';
        this.listeners.clear();
    }

    currentSnapshot(): CoordinatorStatus {
        return {
            snapshot: this.snapshot,
            state: this.state,
            consecutiveFailures: this.consecutiveFailures,
        };
    }

    /**
     * Cached value for one key; undefined until the first snapshot
     *
     * @throws {UnknownKeyError}
     */
    value(key: string): RegisterValue | undefined {
        this.catalog.lookup(key);
        return this.snapshot?.values[key];
    }

    lookup(key: string): RegisterDescriptor {
        return this.catalog.lookup(key);
    }

    subscribe(listener: CoordinatorListener): () => void {
        this.listeners.add(listener);
        return () => this.unsubscribe(listener);
    }

    unsubscribe(listener: CoordinatorListener): void {
        this.listeners.delete(listener);
    }

    requestRefresh(options: OperationOptions = {}): Promise<RefreshResult> {
        if (this.closed) return Promise.resolve(this.cancelled('refresh', 'coordinator is closed'));
        return this.serialized('refresh', () => this.pollCycle(), options.signal);
    }

    /**
     * Validate, encode and write one register, then re-read the catalog so
     * the next snapshot reflects the write.
     */
    write(key: string, value: RegisterValue, options: OperationOptions = {}): Promise<WriteResult> {
        if (this.config.readOnly) {
            return Promise.resolve<WriteResult>({ ok: false, error: new WriteDisabledError(key) });
        }
        if (this.closed) return Promise.resolve(this.cancelled(`write ${key}`, 'coordinator is closed'));

        let target: { address: number; words: number[] };
        try {
            target = this.prepareWrite(key, value);
        } catch (e) {
            if (e instanceof UnknownKeyError || e instanceof ReadOnlyViolationError || e instanceof ValueRangeError) {
                this.logger.warn(`Rejected write ${key}=${value}: ${e.message}`);
                return Promise.resolve<WriteResult>({ ok: false, error: e });
            }
            return Promise.reject(e);
        }

        const { address, words } = target;
        return this.serialized(`write ${key}`, async (): Promise<WriteResult> => {
            try {
                await this.transport.writeWords(address, words);
            } catch (e) {
                const error = this.asTransportError(e);
                this.logger.error(`Write ${key}=${value} failed: ${error.message}`);
                this.state = this.snapshot ? 'degraded' : 'disconnected';
                return { ok: false, error };
            }

            this.logger.info(`Wrote ${key}=${value} (${words.join(',')} @ ${address})`);
            return { ok: true, refresh: await this.pollCycle() };
        }, options.signal);
    }

    private prepareWrite(key: string, value: RegisterValue): { address: number; words: number[] } {
        const descriptor = this.catalog.lookup(key);
        if (descriptor.access !== 'read-write') throw new ReadOnlyViolationError(key);
        return {
            address: descriptor.writeAddress ?? descriptor.address,
            words: encode(value, descriptor),
        };
    }

    private scheduledPoll(): void {
        if (this.scheduledPending) {
            this.logger.debug('Previous scheduled cycle still pending, skipping tick');
            return;
        }
        this.scheduledPending = true;
        this.requestRefresh().then(
            () => { this.scheduledPending = false; },
            (err: unknown) => {
                this.scheduledPending = false;
                this.logger.error(`Scheduled cycle crashed: ${describeError(err)}`);
            },
        );
    }

    /**
     * Enqueue work on the link. Aborting before the work starts skips it;
     * aborting later only stops the caller from waiting.
     */
    private serialized<T extends RefreshResult | WriteResult>(
        operation: string,
        task: () => Promise<T>,
        signal: AbortSignal | undefined,
    ): Promise<T | { ok: false; error: CancelledError }> {
        if (signal?.aborted) return Promise.resolve(this.cancelled(operation, 'aborted by caller'));

        const queued = this.exclusive.run(async () => signal?.aborted ? this.cancelled(operation, 'aborted by caller') : task());
        if (!signal) return queued;

        return new Promise((resolve, reject) => {
            const onAbort = () => resolve(this.cancelled(operation, 'aborted by caller'));
            signal.addEventListener('abort', onAbort, { once: true });
            queued.then(
                (result) => {
                    signal.removeEventListener('abort', onAbort);
                    resolve(result);
                },
                (err: unknown) => {
                    signal.removeEventListener('abort', onAbort);
                    reject(err);
                },
            );
        });
    }

    private async pollCycle(): Promise<RefreshResult> {
        const values: Record<string, RegisterValue> = {};
        try {
            for (const block of this.blocks) {
                const words = await this.transport.readWords(block.address, block.words);
                for (const { key, descriptor } of block.entries) {
                    const start = descriptor.address - block.address;
                    values[key] = decode(words.slice(start, start + descriptor.words), descriptor);
                }
            }
        } catch (e) {
            return this.recordFailure(this.asTransportError(e));
        }
        return this.publish(values);
    }

    private publish(values: Record<string, RegisterValue>): RefreshResult {
        const snapshot: Snapshot = Object.freeze({
            sequence: ++this.sequence,
            timestamp: new Date(),
            values: Object.freeze(values),
        });

        if (this.consecutiveFailures >= this.config.failureThreshold) {
            this.logger.info(`Recovered after ${this.consecutiveFailures} failed cycles`);
        }
        this.snapshot = snapshot;
        this.state = 'connected';
        this.consecutiveFailures = 0;
        this.logger.debug(`Published snapshot #${snapshot.sequence} (${Object.keys(values).length} values)`);

        this.emit({ type: 'snapshot', snapshot });
        return { ok: true, snapshot };
    }

    private recordFailure(error: PollError): RefreshResult {
        this.consecutiveFailures++;
        this.state = this.snapshot ? 'degraded' : 'disconnected';
        this.logger.warn(`Poll cycle failed (${this.consecutiveFailures}x): ${error.message}`);

        const detail = { error, consecutiveFailures: this.consecutiveFailures, snapshot: this.snapshot };
        this.emit({ type: 'failure', ...detail });
        if (this.consecutiveFailures === this.config.failureThreshold) {
            this.logger.error(`${this.consecutiveFailures} consecutive poll cycles failed; device unreachable`);
            this.emit({ type: 'persistent-failure', ...detail });
        }
        return { ok: false, error };
    }

    private emit(event: CoordinatorEvent): void {
        for (const listener of [...this.listeners]) {
            try {
                listener(event);
            } catch (err) {
                this.logger.error(`Listener threw on ${event.type}: ${describeError(err)}`);
            }
        }
    }

    private asTransportError(error: unknown): TransportError {
        if (isTransportError(error)) return error;
        return new ConnectionError(this.config.host, this.config.port, describeError(error));
    }

    private cancelled(operation: string, reason: string): { ok: false; error: CancelledError } {
        return { ok: false, error: new CancelledError(operation, reason) };
    }
}

export default PollingCoordinator;
