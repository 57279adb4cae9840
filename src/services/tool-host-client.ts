import type { ToolContentBlock, ToolDescriptor, ToolResult } from '../core/types.js';
import { ProtocolParseError, RPC_ERROR_CODES, RpcError, TransportClosedError, TransportWriteError } from '../core/errors.js';
import { createRequest, isFailure, isResponse } from '../protocol/envelope.js';
import type { Transport } from '../protocol/line-transport.js';
import type {
    GetPromptResult,
    InitializeResult,
    JsonSchema,
    PromptDescriptor,
    PromptMessage,
    ResourceContents,
    ResourceDescriptor,
    RpcEnvelope,
    ServerInfo,
} from '../types/protocol.js';
import { logThought } from '../utils/logger.js';
import { PROTOCOL_VERSION } from './tool-host.js';

export type ClientState = 'disconnected' | 'connecting' | 'connected' | 'closed';

const DEFAULT_CLIENT_INFO: ServerInfo = { name: 'toolbridge-client', version: '0.1.0' };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSchema(value: unknown): JsonSchema {
    if (!isRecord(value)) {
        return { type: 'object', properties: {}, required: [] };
    }
    const schema: JsonSchema = { type: typeof value.type === 'string' ? value.type : 'object' };
    if (typeof value.description === 'string') schema.description = value.description;
    if (value.default !== undefined) schema.default = value.default;
    if (Array.isArray(value.enum)) {
        schema.enum = value.enum.filter((entry): entry is string => typeof entry === 'string');
    }
    if (isRecord(value.items)) schema.items = toSchema(value.items);
    if (isRecord(value.properties)) {
        schema.properties = Object.fromEntries(
            Object.entries(value.properties).map(([key, property]) => [key, toSchema(property)]),
        );
    }
    if (Array.isArray(value.required)) {
        schema.required = value.required.filter((entry): entry is string => typeof entry === 'string');
    }
    return schema;
}

function toContentBlock(value: unknown): ToolContentBlock {
    if (isRecord(value) && value.type === 'text' && typeof value.text === 'string') {
        return { type: 'text', text: value.text };
    }
    return { type: 'text', text: JSON.stringify(value) };
}

function malformed(method: string, reason: string): RpcError {
    return new RpcError(RPC_ERROR_CODES.InternalError, `Malformed ${method} result: ${reason}`);
}

/**
 * Client side of the tool host protocol.
 *
 * Requests are strictly one at a time per transport: each call waits for the
 * previous exchange to finish, then sends a request with the next integer id
 * and reads until the response carrying that id arrives. Stray responses are
 * logged and skipped.
 */
export class ToolHostClient {
    readonly #transport: Transport;
    readonly #clientInfo: ServerInfo;
    #nextId = 1;
    #queue: Promise<unknown> = Promise.resolve();
    #state: ClientState = 'disconnected';
    #serverInfo: ServerInfo | null = null;

    constructor(transport: Transport, clientInfo: ServerInfo = DEFAULT_CLIENT_INFO) {
        this.#transport = transport;
        this.#clientInfo = clientInfo;
    }

    get state(): ClientState {
        return this.#state;
    }

    get serverInfo(): ServerInfo | null {
        return this.#serverInfo ? { ...this.#serverInfo } : null;
    }

    /** Open the transport and run the `initialize` handshake. */
    async connect(): Promise<InitializeResult> {
        if (this.#state === 'closed') {
            throw new TransportClosedError('Client was closed and cannot reconnect.');
        }
        this.#state = 'connecting';
        try {
            await this.#transport.start();
            const result = await this.request('initialize', {
                protocolVersion: PROTOCOL_VERSION,
                capabilities: {},
                clientInfo: this.#clientInfo,
            });
            if (!isRecord(result) || !isRecord(result.serverInfo) || typeof result.protocolVersion !== 'string') {
                throw malformed('initialize', 'expected protocolVersion and serverInfo');
            }
            const { serverInfo } = result;
            this.#serverInfo = {
                name: typeof serverInfo.name === 'string' ? serverInfo.name : 'unknown',
                version: typeof serverInfo.version === 'string' ? serverInfo.version : 'unknown',
            };
            this.#state = 'connected';
            await logThought(`[ToolHostClient] Connected to ${this.#serverInfo.name} ${this.#serverInfo.version}.`);
            return {
                protocolVersion: result.protocolVersion,
                capabilities: isRecord(result.capabilities) ? result.capabilities : {},
                serverInfo: { ...this.#serverInfo },
            };
        } catch (err) {
            this.#state = 'disconnected';
            throw err;
        }
    }

    /** Send one request and resolve with its result; an error envelope rejects with `RpcError`. */
    request(method: string, params?: Record<string, unknown>): Promise<unknown> {
        const exchange = this.#queue.then(() => this.#exchange(method, params));
        this.#queue = exchange.catch(() => undefined);
        return exchange;
    }

    async listTools(): Promise<ToolDescriptor[]> {
        const result = await this.request('tools/list');
        if (!isRecord(result) || !Array.isArray(result.tools)) {
            throw malformed('tools/list', 'expected a tools array');
        }
        return result.tools.filter(isRecord).flatMap((tool) =>
            typeof tool.name === 'string'
                ? [{
                    name: tool.name,
                    description: typeof tool.description === 'string' ? tool.description : '',
                    parameters: toSchema(tool.inputSchema),
                }]
                : [],
        );
    }

    async callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolResult> {
        const result = await this.request('tools/call', { name, arguments: args });
        if (!isRecord(result) || !Array.isArray(result.content)) {
            throw malformed('tools/call', 'expected a content array');
        }
        return {
            isError: result.isError === true,
            content: result.content.map(toContentBlock),
        };
    }

    async listResources(): Promise<ResourceDescriptor[]> {
        const result = await this.request('resources/list');
        if (!isRecord(result) || !Array.isArray(result.resources)) {
            throw malformed('resources/list', 'expected a resources array');
        }
        return result.resources.filter(isRecord).flatMap((entry) =>
            typeof entry.uri === 'string' && typeof entry.name === 'string'
                ? [{
                    uri: entry.uri,
                    name: entry.name,
                    description: typeof entry.description === 'string' ? entry.description : undefined,
                    mimeType: typeof entry.mimeType === 'string' ? entry.mimeType : undefined,
                }]
                : [],
        );
    }

    async readResource(uri: string): Promise<ResourceContents> {
        const result = await this.request('resources/read', { uri });
        const first = isRecord(result) && Array.isArray(result.contents) ? result.contents[0] : undefined;
        if (!isRecord(first) || typeof first.text !== 'string') {
            throw malformed('resources/read', 'expected text contents');
        }
        return {
            uri: typeof first.uri === 'string' ? first.uri : uri,
            mimeType: typeof first.mimeType === 'string' ? first.mimeType : 'text/plain',
            text: first.text,
        };
    }

    async listPrompts(): Promise<PromptDescriptor[]> {
        const result = await this.request('prompts/list');
        if (!isRecord(result) || !Array.isArray(result.prompts)) {
            throw malformed('prompts/list', 'expected a prompts array');
        }
        return result.prompts.filter(isRecord).flatMap((entry) =>
            typeof entry.name === 'string'
                ? [{ name: entry.name, description: typeof entry.description === 'string' ? entry.description : undefined }]
                : [],
        );
    }

    async getPrompt(name: string, args: Record<string, string> = {}): Promise<GetPromptResult> {
        const result = await this.request('prompts/get', { name, arguments: args });
        if (!isRecord(result) || !Array.isArray(result.messages)) {
            throw malformed('prompts/get', 'expected a messages array');
        }
        const messages = result.messages.filter(isRecord).flatMap((message): PromptMessage[] => {
            const { role, content } = message;
            if (typeof content !== 'string') return [];
            if (role === 'system' || role === 'user' || role === 'assistant') {
                return [{ role, content }];
            }
            return [];
        });
        return { description: typeof result.description === 'string' ? result.description : '', messages };
    }

    /** Stop the transport. Safe to call again, and after the transport already failed. */
    async close(): Promise<void> {
        this.#state = 'closed';
        await this.#transport.stop();
        await logThought('[ToolHostClient] Closed.');
    }

    async #exchange(method: string, params?: Record<string, unknown>): Promise<unknown> {
        const id = this.#nextId++;
        try {
            await this.#transport.send(createRequest(id, method, params));
        } catch (err) {
            if (err instanceof TransportWriteError) this.#state = 'closed';
            throw err;
        }

        for (;;) {
            let envelope: RpcEnvelope;
            try {
                envelope = await this.#transport.receive();
            } catch (err) {
                if (err instanceof ProtocolParseError) {
                    console.warn(`[ToolHostClient] Skipping unreadable line from host: ${err.message}`);
                    continue;
                }
                if (err instanceof TransportClosedError) this.#state = 'closed';
                throw err;
            }

            if (!isResponse(envelope)) {
                await logThought(`[ToolHostClient] Skipping non-response envelope while waiting for #${id}.`);
                continue;
            }
            // A null id means the host could not read our request; with one request
            // in flight it can only be this one.
            if (envelope.id !== id && envelope.id !== null) {
                console.warn(`[ToolHostClient] Skipping response for id ${String(envelope.id)} (waiting for ${id}).`);
                continue;
            }
            if (isFailure(envelope)) {
                throw new RpcError(envelope.error.code, envelope.error.message);
            }
            return envelope.result;
        }
    }
}
