import type { ConversationMessage, ToolCallMode, ToolDescriptor } from './types.js';
import type { JsonSchema } from '../types/protocol.js';

const BASE_DIRECTIVES = `
You are a helpful corporate assistant. You have access to tools that return the company's data.
When you need data to answer a question, use the tools. Never make information up.

Rules:
- Questions about free time or the schedule: use get_available_slots
- Requests to book a meeting: use schedule_meeting
- Questions about regulations or policies: use search_regulations
- Questions about the development plan: use get_development_plan
`.trim();

function describeParameter(name: string, schema: JsonSchema, required: boolean): string {
    const details = [schema.type, required ? 'required' : 'optional'];
    if (schema.default !== undefined) {
        details.push(`default ${JSON.stringify(schema.default)}`);
    }
    const description = schema.description ? `: ${schema.description}` : '';
    return `${name} (${details.join(', ')})${description}`;
}

/** One catalog entry: name and description, then its parameters if it has any. */
export function describeTool(tool: ToolDescriptor): string {
    const required = new Set(tool.parameters.required ?? []);
    const parameters = Object.entries(tool.parameters.properties ?? {}).map(([name, schema]) =>
        describeParameter(name, schema, required.has(name)),
    );
    const head = `- ${tool.name}: ${tool.description}`;
    return parameters.length > 0 ? `${head}\n  Parameters: ${parameters.join('; ')}` : head;
}

export function buildSystemPrompt(tools: readonly ToolDescriptor[], mode: ToolCallMode): string {
    const sections = [BASE_DIRECTIVES, `AVAILABLE TOOLS:\n${tools.map(describeTool).join('\n')}`];

    if (mode === 'inline') {
        sections.push(
            [
                'To call a tool, write a marker in your reply:',
                '[TOOL_CALL:<tool_name>:<JSON arguments>]',
                'Example: [TOOL_CALL:search_regulations:{"query": "vacation"}]',
                'Use {} when a tool takes no arguments. Each marker is replaced by the tool result.',
            ].join('\n'),
        );
    }
    return sections.join('\n\n');
}

/**
 * System instruction, then the recent history, then the new user message.
 * Tool messages at the start of the window lost the request they answer, so they are dropped.
 */
export function assembleContext(
    systemPrompt: string,
    history: readonly ConversationMessage[],
    userMessage: string,
): ConversationMessage[] {
    let first = 0;
    while (first < history.length && history[first]?.role === 'tool') first++;

    return [
        { role: 'system', content: systemPrompt },
        ...history.slice(first).map((message) => ({ ...message })),
        { role: 'user', content: userMessage },
    ];
}
