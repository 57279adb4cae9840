import { createInterface, type Interface } from 'node:readline';
import { Readable } from 'node:stream';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { JSONRPCMessageSchema, type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { ProtocolParseError, TransportClosedError, TransportWriteError, describeError } from '../core/errors.js';
import type { RpcEnvelope } from '../types/protocol.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { toEnvelope } from './envelope.js';
import { Inbox } from './inbox.js';
import type { Transport } from './line-transport.js';

export interface ProcessTransportOptions {
    command: string;
    args: string[];
    /** Extra environment for the subprocess, merged over the parent's. */
    env?: Record<string, string>;
    cwd?: string;
}

function inheritedEnv(): Record<string, string> {
    return Object.fromEntries(
        Object.entries(process.env).filter((entry): entry is [string, string] => entry[1] !== undefined),
    );
}

function isReadFailure(error: Error): boolean {
    return error instanceof SyntaxError || error.name === 'ZodError';
}

/**
 * Transport over a spawned tool-host subprocess, on the MCP SDK's stdio client
 * transport. stderr lines are forwarded to the console, prefixed with the
 * command name.
 */
export class ProcessTransport implements Transport {
    readonly #options: ProcessTransportOptions;
    readonly #stdio: StdioClientTransport;
    readonly #inbox = new Inbox<RpcEnvelope | ProtocolParseError>();
    #stderrLines: Interface | null = null;
    #started = false;
    #stopped = false;
    #failure: Error | null = null;

    constructor(options: ProcessTransportOptions) {
        this.#options = options;
        this.#stdio = new StdioClientTransport({
            command: options.command,
            args: options.args,
            env: { ...inheritedEnv(), ...options.env },
            cwd: options.cwd,
            stderr: 'pipe',
        });
        this.#stdio.onmessage = (message) => this.#inbox.push(this.#decode(message));
        this.#stdio.onerror = (error) => this.#onError(error);
        this.#stdio.onclose = () => this.#inbox.close('Stream ended.');
    }

    get isOpen(): boolean {
        return this.#started && !this.#stopped && !this.#inbox.closed;
    }

    async start(): Promise<void> {
        if (this.#stopped) {
            throw new TransportClosedError('Transport was stopped and cannot be restarted.');
        }
        if (this.#started) return;

        const { command, args } = this.#options;
        await logThought(`[ProcessTransport] Spawning tool host: ${command} ${args.join(' ')}`);
        try {
            await this.#stdio.start();
        } catch (err) {
            throw new TransportClosedError(`Failed to start tool host '${command}': ${describeError(err)}`, { cause: err });
        }
        this.#started = true;

        const stderr = this.#stdio.stderr;
        if (stderr instanceof Readable) {
            this.#stderrLines = createInterface({ input: stderr });
            this.#stderrLines.on('line', (line) => {
                console.error(`[${command}] ${scrubSensitiveText(line)}`);
            });
        }
    }

    async send(envelope: RpcEnvelope): Promise<void> {
        if (!this.isOpen) {
            throw new TransportWriteError('Cannot write: transport is not open.');
        }
        if (this.#failure) {
            throw new TransportWriteError(`Cannot write: ${this.#failure.message}`, { cause: this.#failure });
        }

        const message = JSONRPCMessageSchema.safeParse({ ...envelope, jsonrpc: '2.0' });
        if (!message.success) {
            throw new TransportWriteError(`Cannot encode envelope: ${message.error.message}`);
        }
        try {
            await this.#stdio.send(message.data);
        } catch (err) {
            throw new TransportWriteError(`Write failed: ${describeError(err)}`, { cause: err });
        }
    }

    async receive(): Promise<RpcEnvelope> {
        if (this.#stopped) {
            throw new TransportClosedError('Transport is closed.');
        }
        if (!this.#started) {
            throw new TransportClosedError('Transport is not started.');
        }
        const item = await this.#inbox.next();
        if (item instanceof ProtocolParseError) throw item;
        return item;
    }

    async stop(): Promise<void> {
        if (this.#stopped) return;
        this.#stopped = true;

        this.#inbox.close('Transport stopped.');
        this.#stderrLines?.close();
        this.#stderrLines = null;
        await this.#stdio.close();
        await logThought(`[ProcessTransport] Tool host '${this.#options.command}' stopped.`);
    }

    #decode(message: JSONRPCMessage): RpcEnvelope | ProtocolParseError {
        try {
            return toEnvelope(message);
        } catch (err) {
            if (err instanceof ProtocolParseError) return err;
            throw err;
        }
    }

    #onError(error: Error): void {
        // Unreadable stdout lines arrive on the same hook as process faults.
        if (isReadFailure(error)) {
            this.#inbox.push(new ProtocolParseError(`Parse error: ${error.message}`, ''));
            return;
        }
        this.#failure = error;
        console.error(`[ProcessTransport] Tool host error: ${scrubSensitiveText(error.message)}`);
    }
}
