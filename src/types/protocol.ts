/** JSON Schema object for describing tool parameters. */
export interface JsonSchema {
    type: string;
    properties?: Record<string, JsonSchema>;
    required?: string[];
    description?: string;
    items?: JsonSchema;
    enum?: string[];
    default?: unknown;
    [key: string]: unknown;
}

export type RpcId = number | string;

export interface RpcRequest {
    jsonrpc?: '2.0';
    id: RpcId;
    method: string;
    params?: Record<string, unknown>;
}

/** A request that expects no response. */
export interface RpcNotification {
    jsonrpc?: '2.0';
    id?: never;
    method: string;
    params?: Record<string, unknown>;
}

export interface RpcSuccess {
    jsonrpc?: '2.0';
    id: RpcId;
    result: unknown;
}

export interface RpcErrorBody {
    code: number;
    message: string;
}

export interface RpcFailure {
    jsonrpc?: '2.0';
    id: RpcId | null;
    error: RpcErrorBody;
}

export type RpcResponse = RpcSuccess | RpcFailure;

/** One framed unit on the transport. */
export type RpcEnvelope = RpcRequest | RpcNotification | RpcResponse;

/** Tool entry as it appears in a `tools/list` result. */
export interface WireTool {
    name: string;
    description: string;
    inputSchema: JsonSchema;
}

export interface ServerInfo {
    name: string;
    version: string;
}

export interface ServerCapabilities {
    tools?: { listChanged?: boolean };
    resources?: { subscribe?: boolean; listChanged?: boolean };
    prompts?: { listChanged?: boolean };
}

export interface InitializeParams {
    protocolVersion: string;
    capabilities: Record<string, unknown>;
    clientInfo: ServerInfo;
}

export interface InitializeResult {
    protocolVersion: string;
    capabilities: ServerCapabilities;
    serverInfo: ServerInfo;
}

export interface CallToolParams {
    name: string;
    arguments: Record<string, unknown>;
}

export interface CallToolResult {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
}

export interface ResourceDescriptor {
    uri: string;
    name: string;
    description?: string;
    mimeType?: string;
}

export interface ResourceContents {
    uri: string;
    mimeType: string;
    text: string;
}

export interface PromptArgument {
    name: string;
    description: string;
    required: boolean;
}

export interface PromptDescriptor {
    name: string;
    description?: string;
    arguments?: PromptArgument[];
}

export interface PromptMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface GetPromptResult {
    description: string;
    messages: PromptMessage[];
}
