import {
    describeError,
    MethodNotFoundError,
    ProtocolParseError,
    RPC_ERROR_CODES,
    RpcError,
    TransportClosedError,
} from '../core/errors.js';
import type { ToolResult } from '../core/types.js';
import { createFailure, createSuccess, isNotification, isResponse } from '../protocol/envelope.js';
import type { Transport } from '../protocol/line-transport.js';
import type { PromptDefinition, ResourceDefinition } from '../skills/catalog.js';
import type { ToolContext } from '../skills/types.js';
import type {
    GetPromptResult,
    InitializeResult,
    ResourceContents,
    RpcEnvelope,
    RpcResponse,
    ServerInfo,
    WireTool,
} from '../types/protocol.js';
import { logThought, logToolCall } from '../utils/logger.js';
import type { CalendarStore } from './calendar-store.js';
import type { CorporateData } from './corporate-data.js';
import type { ToolRegistry } from './tool-registry.js';

export const PROTOCOL_VERSION = '2024-11-05';

const DEFAULT_SERVER_INFO: ServerInfo = { name: 'toolbridge-host', version: '0.1.0' };

export type HostMethod =
    | 'initialize'
    | 'tools/list'
    | 'tools/call'
    | 'resources/list'
    | 'resources/read'
    | 'prompts/list'
    | 'prompts/get';

type MethodHandler = (params: Record<string, unknown>) => Promise<unknown>;

export interface ToolHostOptions {
    registry: ToolRegistry;
    calendar: CalendarStore;
    data: CorporateData;
    resources?: ResourceDefinition[];
    prompts?: PromptDefinition[];
    serverInfo?: ServerInfo;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatToolOutput(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value === undefined) return '';
    return JSON.stringify(value, null, 2);
}

function errorResult(text: string): ToolResult {
    return { isError: true, content: [{ type: 'text', text }] };
}

/**
 * Serves the tool registry over a line transport.
 *
 * Requests are dispatched through a fixed method table; a failing tool becomes
 * an `isError` result, so one bad call never takes the host down.
 */
export class ToolHost {
    readonly #registry: ToolRegistry;
    readonly #context: ToolContext;
    readonly #resources: ResourceDefinition[];
    readonly #prompts: PromptDefinition[];
    readonly #serverInfo: ServerInfo;
    readonly #methods: Record<HostMethod, MethodHandler>;

    constructor(options: ToolHostOptions) {
        this.#registry = options.registry;
        this.#resources = options.resources ?? [];
        this.#prompts = options.prompts ?? [];
        this.#serverInfo = options.serverInfo ?? DEFAULT_SERVER_INFO;
        this.#context = {
            calendar: options.calendar,
            data: options.data,
            listTools: () => this.#registry.describe(),
        };

        this.#methods = {
            'initialize': async () => this.initialize(),
            'tools/list': async () => ({ tools: this.listTools() }),
            'tools/call': async (params) => this.#handleToolCall(params),
            'resources/list': async () => ({
                resources: this.#resources.map(({ uri, name, description, mimeType }) => ({ uri, name, description, mimeType })),
            }),
            'resources/read': async (params) => ({ contents: [this.#readResource(params)] }),
            'prompts/list': async () => ({
                prompts: this.#prompts.map(({ name, description, arguments: args }) => ({ name, description, arguments: args })),
            }),
            'prompts/get': async (params) => this.#getPrompt(params),
        };
    }

    initialize(): InitializeResult {
        return {
            protocolVersion: PROTOCOL_VERSION,
            capabilities: {
                tools: { listChanged: true },
                resources: { subscribe: false, listChanged: false },
                prompts: { listChanged: false },
            },
            serverInfo: { ...this.#serverInfo },
        };
    }

    listTools(): WireTool[] {
        return this.#registry.describe().map(({ name, description, parameters }) => ({
            name,
            description,
            inputSchema: parameters,
        }));
    }

    /** Run one tool. Never throws: unknown names and handler faults become error results. */
    async callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolResult> {
        const tool = this.#registry.find(name);
        if (!tool) {
            await logThought(`[ToolHost] Unknown tool requested: ${name}`);
            return errorResult(`Unknown tool: ${name}`);
        }

        try {
            const output = formatToolOutput(await tool.handler(args, this.#context));
            await logToolCall(name, args, output);
            return { isError: false, content: [{ type: 'text', text: output }] };
        } catch (err) {
            const message = describeError(err);
            await logToolCall(name, args, `ERROR: ${message}`);
            return errorResult(message);
        }
    }

    /** Answer one envelope. Returns null for notifications and stray responses. */
    async handle(envelope: RpcEnvelope): Promise<RpcResponse | null> {
        if (isResponse(envelope)) {
            await logThought('[ToolHost] Ignoring a response envelope sent to the host.');
            return null;
        }
        if (isNotification(envelope)) {
            await logThought(`[ToolHost] Notification received: ${envelope.method}`);
            return null;
        }

        const { id, method } = envelope;
        if (!this.#isHostMethod(method)) {
            const error = new MethodNotFoundError(method);
            return createFailure(id, RPC_ERROR_CODES.MethodNotFound, error.message);
        }

        try {
            const result = await this.#methods[method](envelope.params ?? {});
            return createSuccess(id, result);
        } catch (err) {
            const code = err instanceof RpcError ? err.code : RPC_ERROR_CODES.InternalError;
            console.error(`[ToolHost] ${method} failed: ${describeError(err)}`);
            return createFailure(id, code, describeError(err));
        }
    }

    /**
     * Receive, handle and reply until the peer closes the channel. Malformed
     * lines get an error envelope and the loop carries on.
     */
    async serve(transport: Transport): Promise<void> {
        await transport.start();
        await logThought(`[ToolHost] Serving ${this.#registry.size} tools.`);

        try {
            for (;;) {
                let envelope: RpcEnvelope;
                try {
                    envelope = await transport.receive();
                } catch (err) {
                    if (err instanceof ProtocolParseError) {
                        console.error(`[ToolHost] ${err.message}`);
                        await transport.send(createFailure(err.requestId, err.code, err.message));
                        continue;
                    }
                    if (err instanceof TransportClosedError) {
                        await logThought(`[ToolHost] Transport closed: ${err.message}`);
                        break;
                    }
                    throw err;
                }

                const response = await this.handle(envelope);
                if (response) {
                    await transport.send(response);
                }
            }
        } finally {
            await transport.stop();
        }
    }

    #isHostMethod(method: string): method is HostMethod {
        return Object.hasOwn(this.#methods, method);
    }

    async #handleToolCall(params: Record<string, unknown>): Promise<ToolResult> {
        const name = params.name;
        if (typeof name !== 'string' || name.length === 0) {
            throw new RpcError(RPC_ERROR_CODES.InvalidParams, "tools/call requires a string 'name'.");
        }
        const args = params.arguments;
        if (args !== undefined && args !== null && !isRecord(args)) {
            throw new RpcError(RPC_ERROR_CODES.InvalidParams, "tools/call 'arguments' must be an object.");
        }
        return this.callTool(name, isRecord(args) ? args : {});
    }

    #readResource(params: Record<string, unknown>): ResourceContents {
        const uri = params.uri;
        if (typeof uri !== 'string') {
            throw new RpcError(RPC_ERROR_CODES.InvalidParams, "resources/read requires a string 'uri'.");
        }
        const resource = this.#resources.find((entry) => entry.uri === uri);
        if (!resource) {
            throw new Error(`Unknown resource: ${uri}`);
        }
        return {
            uri,
            mimeType: resource.mimeType ?? 'application/json',
            text: formatToolOutput(resource.read(this.#context)),
        };
    }

    #getPrompt(params: Record<string, unknown>): GetPromptResult {
        const name = params.name;
        if (typeof name !== 'string') {
            throw new RpcError(RPC_ERROR_CODES.InvalidParams, "prompts/get requires a string 'name'.");
        }
        const prompt = this.#prompts.find((entry) => entry.name === name);
        if (!prompt) {
            throw new Error(`Unknown prompt: ${name}`);
        }

        const args: Record<string, string> = {};
        const rawArgs = params.arguments;
        if (isRecord(rawArgs)) {
            for (const [key, value] of Object.entries(rawArgs)) {
                if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
                    args[key] = String(value);
                }
            }
        }
        return prompt.render(args);
    }
}
