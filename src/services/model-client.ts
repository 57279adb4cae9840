import type { AssistantReply, ConversationMessage, ToolCallRequest, ToolDescriptor } from '../core/types.js';
import { ModelEndpointError } from '../core/errors.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

export const DEFAULT_MODEL_TIMEOUT_MS = 30_000;

export type ModelProvider = 'ollama' | 'openai-compatible';

export interface ModelRequest {
    messages: readonly ConversationMessage[];
    /** Only sent when tools travel in the provider's structured field. */
    tools?: readonly ToolDescriptor[];
}

/** The opaque boundary to a chat model. Implementations throw `ModelEndpointError`. */
export interface ModelClient {
    readonly model: string;
    complete(request: ModelRequest): Promise<AssistantReply>;
}

export interface ModelClientOptions {
    baseUrl: string;
    model: string;
    apiKey?: string;
    timeoutMs?: number;
}

interface WireToolCall {
    id?: string;
    type: 'function';
    function: { name: string; arguments: Record<string, unknown> | string };
}

interface WireMessage {
    role: string;
    content: string;
    tool_calls?: WireToolCall[];
    tool_call_id?: string;
    name?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Decode a tool-call argument blob; blank or invalid JSON means "no arguments". */
export function decodeArguments(raw: unknown): Record<string, unknown> {
    if (isRecord(raw)) return raw;
    if (typeof raw !== 'string' || raw.trim().length === 0) return {};
    try {
        const parsed: unknown = JSON.parse(raw);
        return isRecord(parsed) ? parsed : {};
    } catch {
        return {};
    }
}

function toWireTools(tools: readonly ToolDescriptor[]): Array<Record<string, unknown>> {
    return tools.map((tool) => ({
        type: 'function',
        function: { name: tool.name, description: tool.description, parameters: tool.parameters },
    }));
}

function readToolCalls(value: unknown): ToolCallRequest[] {
    if (!Array.isArray(value)) return [];
    const calls: ToolCallRequest[] = [];
    for (const entry of value) {
        if (!isRecord(entry) || !isRecord(entry.function)) continue;
        const name = entry.function.name;
        if (typeof name !== 'string' || name.length === 0) continue;
        const call: ToolCallRequest = { toolName: name, arguments: decodeArguments(entry.function.arguments) };
        if (typeof entry.id === 'string') call.id = entry.id;
        calls.push(call);
    }
    return calls;
}

/**
 * Shared HTTP plumbing: one POST per completion, bounded by `timeoutMs`. Every
 * failure (network, timeout, non-2xx, unreadable body) becomes `ModelEndpointError`.
 */
abstract class HttpModelClient implements ModelClient {
    readonly model: string;
    protected readonly baseUrl: string;
    protected readonly apiKey: string | undefined;
    protected readonly timeoutMs: number;

    constructor(options: ModelClientOptions) {
        this.model = options.model;
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.apiKey = options.apiKey;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS;
    }

    abstract complete(request: ModelRequest): Promise<AssistantReply>;

    protected async postJson(path: string, payload: Record<string, unknown>): Promise<Record<string, unknown>> {
        const url = `${this.baseUrl}${path}`;
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (this.apiKey) {
            headers.Authorization = `Bearer ${this.apiKey}`;
        }

        let response: Response;
        try {
            response = await fetch(url, {
                method: 'POST',
                headers,
                body: JSON.stringify(payload),
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (err) {
            if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
                throw new ModelEndpointError(`Model request to ${url} timed out after ${this.timeoutMs}ms.`, null, { cause: err });
            }
            const reason = scrubSensitiveText(err instanceof Error ? err.message : String(err));
            throw new ModelEndpointError(`Model request to ${url} failed: ${reason}`, null, { cause: err });
        }

        if (!response.ok) {
            const body = scrubSensitiveText(await response.text());
            throw new ModelEndpointError(`HTTP ${response.status}: ${body}`, response.status);
        }

        let data: unknown;
        try {
            data = await response.json();
        } catch (err) {
            throw new ModelEndpointError(`Model ${this.model} returned a body that is not JSON.`, response.status, { cause: err });
        }
        if (!isRecord(data)) {
            throw new ModelEndpointError(`Model ${this.model} returned an unexpected payload.`, response.status);
        }
        return data;
    }
}

/** Ollama's native `/api/chat`; tool-call arguments arrive as objects. */
export class OllamaModelClient extends HttpModelClient {
    async complete(request: ModelRequest): Promise<AssistantReply> {
        const payload: Record<string, unknown> = {
            model: this.model,
            messages: request.messages.map((message) => this.#toWire(message)),
            stream: false,
        };
        if (request.tools && request.tools.length > 0) {
            payload.tools = toWireTools(request.tools);
        }

        const data = await this.postJson('/api/chat', payload);
        const message = data.message;
        if (!isRecord(message)) {
            throw new ModelEndpointError(`Model ${this.model} returned no message.`);
        }
        const reply = {
            content: typeof message.content === 'string' ? message.content : '',
            toolCalls: readToolCalls(message.tool_calls),
        };
        await logThought(`[OllamaModelClient] ${this.model} replied (${reply.toolCalls.length} tool calls).`);
        return reply;
    }

    #toWire(message: ConversationMessage): WireMessage {
        const wire: WireMessage = { role: message.role, content: message.content };
        if (message.toolCalls && message.toolCalls.length > 0) {
            wire.tool_calls = message.toolCalls.map((call) => ({
                type: 'function',
                function: { name: call.toolName, arguments: call.arguments },
            }));
        }
        if (message.role === 'tool' && message.toolName) {
            wire.name = message.toolName;
        }
        return wire;
    }
}

/** Any `/chat/completions` endpoint; tool-call arguments arrive as JSON strings. */
export class OpenAiCompatModelClient extends HttpModelClient {
    async complete(request: ModelRequest): Promise<AssistantReply> {
        const payload: Record<string, unknown> = {
            model: this.model,
            messages: request.messages.map((message) => this.#toWire(message)),
        };
        if (request.tools && request.tools.length > 0) {
            payload.tools = toWireTools(request.tools);
            payload.tool_choice = 'auto';
        }

        const data = await this.postJson('/chat/completions', payload);
        const choices = data.choices;
        const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
        const message = isRecord(first) ? first.message : undefined;
        if (!isRecord(message)) {
            throw new ModelEndpointError(`Model ${this.model} returned empty choices payload.`);
        }
        const reply = {
            content: typeof message.content === 'string' ? message.content : '',
            toolCalls: readToolCalls(message.tool_calls),
        };
        await logThought(`[OpenAiCompatModelClient] ${this.model} replied (${reply.toolCalls.length} tool calls).`);
        return reply;
    }

    #toWire(message: ConversationMessage): WireMessage {
        // The API rejects a tool message that answers no tool_call; inline results go as plain text.
        if (message.role === 'tool' && !message.toolCallId) {
            return { role: 'user', content: `Result of ${message.toolName ?? 'tool'}:\n${message.content}` };
        }
        const wire: WireMessage = { role: message.role, content: message.content };
        if (message.toolCalls && message.toolCalls.length > 0) {
            wire.tool_calls = message.toolCalls.map((call, index) => ({
                id: call.id ?? `call_${index}`,
                type: 'function',
                function: { name: call.toolName, arguments: JSON.stringify(call.arguments) },
            }));
        }
        if (message.role === 'tool') {
            if (message.toolCallId) wire.tool_call_id = message.toolCallId;
            if (message.toolName) wire.name = message.toolName;
        }
        return wire;
    }
}

export function createModelClient(provider: ModelProvider, options: ModelClientOptions): ModelClient {
    return provider === 'openai-compatible' ? new OpenAiCompatModelClient(options) : new OllamaModelClient(options);
}
