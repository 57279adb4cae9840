import type { JsonSchema } from '../types/protocol.js';

export type ConversationRole = 'system' | 'user' | 'assistant' | 'tool';

/** A request, parsed out of a model reply, to run one tool. */
export interface ToolCallRequest {
    /** Provider-assigned id for structured calls; absent for inline markers. */
    id?: string;
    toolName: string;
    arguments: Record<string, unknown>;
}

export interface ToolContentBlock {
    type: 'text';
    text: string;
}

export interface ToolResult {
    isError: boolean;
    content: ToolContentBlock[];
}

export interface ConversationMessage {
    role: ConversationRole;
    content: string;
    /** Only set on assistant messages that requested tools mid-turn. */
    toolCalls?: ToolCallRequest[];
    /** Name of the tool a `tool` message answers. */
    toolName?: string;
    /** Provider id of the structured call a `tool` message answers. */
    toolCallId?: string;
}

export interface ToolDescriptor {
    name: string;
    description: string;
    parameters: JsonSchema;
}

/** What a model endpoint returns for one completion. */
export interface AssistantReply {
    content: string;
    toolCalls: ToolCallRequest[];
}

export type ToolCallMode = 'structured' | 'inline';

export type InlineFinalization = 'substitute' | 'follow-up';
