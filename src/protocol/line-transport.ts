import type { Readable, Writable } from 'node:stream';
import { TransportClosedError, TransportWriteError } from '../core/errors.js';
import type { RpcEnvelope } from '../types/protocol.js';
import { decodeEnvelope, encodeEnvelope } from './envelope.js';
import { Inbox } from './inbox.js';

/** A duplex channel carrying one envelope per line. */
export interface Transport {
    start(): Promise<void>;
    send(envelope: RpcEnvelope): Promise<void>;
    /** Resolves with the next envelope; rejects with ProtocolParseError or TransportClosedError. */
    receive(): Promise<RpcEnvelope>;
    stop(): Promise<void>;
    readonly isOpen: boolean;
}

export interface LineStreams {
    input: Readable;
    output: Writable;
}

/**
 * Line-delimited envelope framing over any readable/writable pair.
 *
 * Incoming bytes are buffered and split on `\n`; each complete line is handed to
 * exactly one `receive()` call. When the input ends, or `stop()` runs, every
 * pending and future `receive()` rejects with `TransportClosedError`.
 */
export class LineTransport implements Transport {
    readonly #streams: LineStreams;
    #buffer = '';
    readonly #inbox = new Inbox<string>();
    #started = false;
    #stopped = false;
    #outputError: Error | null = null;
    #detach: (() => void) | null = null;

    constructor(streams: LineStreams) {
        this.#streams = streams;
    }

    get isOpen(): boolean {
        return this.#started && !this.#stopped && !this.#inbox.closed;
    }

    async start(): Promise<void> {
        if (this.#stopped) {
            throw new TransportClosedError('Transport was stopped and cannot be restarted.');
        }
        if (this.#started) return;

        this.#started = true;

        const { input, output } = this.#streams;
        input.setEncoding('utf8');

        const onData = (chunk: string | Buffer) => this.#ingest(String(chunk));
        const onEnd = () => this.#markInputEnded('Stream ended.');
        const onInputError = (err: Error) => this.#markInputEnded(`Stream failed: ${err.message}`);
        const onOutputError = (err: Error) => {
            this.#outputError = err;
        };

        input.on('data', onData);
        input.on('end', onEnd);
        input.on('close', onEnd);
        input.on('error', onInputError);
        output.on('error', onOutputError);

        this.#detach = () => {
            input.off('data', onData);
            input.off('end', onEnd);
            input.off('close', onEnd);
            input.off('error', onInputError);
            output.off('error', onOutputError);
        };
    }

    async send(envelope: RpcEnvelope): Promise<void> {
        const { output } = this.#streams;
        if (!this.#started || this.#stopped) {
            throw new TransportWriteError('Cannot write: transport is not open.');
        }
        if (this.#outputError) {
            throw new TransportWriteError(`Cannot write: ${this.#outputError.message}`, {
                cause: this.#outputError,
            });
        }
        if (output.destroyed || output.writableEnded) {
            throw new TransportWriteError('Cannot write: output stream is closed.');
        }

        const line = `${encodeEnvelope(envelope)}\n`;
        await new Promise<void>((resolve, reject) => {
            output.write(line, 'utf8', (err) => {
                if (err) {
                    reject(new TransportWriteError(`Write failed: ${err.message}`, { cause: err }));
                    return;
                }
                resolve();
            });
        });
    }

    async receive(): Promise<RpcEnvelope> {
        const line = await this.#nextLine();
        return decodeEnvelope(line);
    }

    async stop(): Promise<void> {
        if (this.#stopped) return;
        this.#stopped = true;

        this.#detach?.();
        this.#detach = null;
        this.#inbox.close('Transport stopped.');

        const { output } = this.#streams;
        if (!output.destroyed && !output.writableEnded) {
            output.end();
        }
    }

    #nextLine(): Promise<string> {
        if (this.#stopped) {
            return Promise.reject(new TransportClosedError('Transport is closed.'));
        }
        if (!this.#started) {
            return Promise.reject(new TransportClosedError('Transport is not started.'));
        }
        return this.#inbox.next();
    }

    #ingest(chunk: string): void {
        this.#buffer += chunk;

        let newlineIndex = this.#buffer.indexOf('\n');
        while (newlineIndex !== -1) {
            let line = this.#buffer.slice(0, newlineIndex);
            this.#buffer = this.#buffer.slice(newlineIndex + 1);
            if (line.endsWith('\r')) {
                line = line.slice(0, -1);
            }
            if (line.trim().length > 0) {
                this.#inbox.push(line);
            }
            newlineIndex = this.#buffer.indexOf('\n');
        }
    }

    #markInputEnded(reason: string): void {
        if (this.#inbox.closed) return;

        // A final line without a trailing newline still counts.
        const remainder = this.#buffer.trim();
        this.#buffer = '';
        if (remainder.length > 0) {
            this.#inbox.push(remainder);
        }
        this.#inbox.close(reason);
    }
}
