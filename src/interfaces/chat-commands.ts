import type { ToolCallMode } from '../core/types.js';
import { describeError } from '../core/errors.js';
import { resultText } from '../core/lane-executor.js';
import type { Orchestrator, ToolGateway, TurnOutcome } from '../core/orchestrator.js';
import { parseToolCallMode } from '../config/app-config.js';
import type { ConversationStore } from '../services/conversation-store.js';

const HISTORY_LIMIT = 10;
const HISTORY_PREVIEW_CHARS = 100;
const DEBUG_PREVIEW_CHARS = 100;

export interface CommandReply {
  text: string;
  /** Set by /exit and /quit. */
  exit?: boolean;
}

export interface ChatCommandsOptions {
  orchestrator: Orchestrator;
  tools: ToolGateway;
  conversations: ConversationStore;
}

type CommandHandler = (sessionId: string, args: string[]) => Promise<CommandReply>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export const USAGE = {
  search: 'Usage: /search <query>\nExample: /search vacation',
  meet: 'Usage: /meet <date> <time> <title>\nExample: /meet 2024-01-19 14:00 Team sync',
  mode: 'Usage: /mode [structured|inline]',
} as const;

/**
 * Slash commands shared by the terminal chat and the Telegram bot, plus the
 * per-session debug switch. Plain text goes to the orchestrator.
 */
export class ChatCommands {
  readonly #orchestrator: Orchestrator;
  readonly #tools: ToolGateway;
  readonly #conversations: ConversationStore;
  readonly #debugSessions: Set<string> = new Set();
  readonly #commands: Record<string, CommandHandler>;

  constructor(options: ChatCommandsOptions) {
    this.#orchestrator = options.orchestrator;
    this.#tools = options.tools;
    this.#conversations = options.conversations;

    this.#commands = {
      '/start': async (sessionId) => ({ text: this.#welcomeText(sessionId) }),
      '/help': async (sessionId) => ({ text: this.#helpText(sessionId) }),
      '/tools': async () => this.#toolsCommand(),
      '/slots': async () => this.#slotsCommand(),
      '/plan': async () => this.#planCommand(),
      '/search': async (_sessionId, args) => this.#searchCommand(args),
      '/meet': async (_sessionId, args) => this.#meetCommand(args),
      '/history': async (sessionId) => ({ text: this.#historyText(sessionId) }),
      '/clear': async (sessionId) => {
        this.#conversations.clear(sessionId);
        return { text: 'History cleared.' };
      },
      '/debug': async (sessionId) => ({ text: this.#toggleDebug(sessionId) }),
      '/mode': async (_sessionId, args) => ({ text: this.#modeCommand(args) }),
      '/exit': async () => ({ text: 'Goodbye!', exit: true }),
      '/quit': async () => ({ text: 'Goodbye!', exit: true }),
    };
  }

  isDebug(sessionId: string): boolean {
    return this.#debugSessions.has(sessionId);
  }

  /** Answer one line of user input: a slash command, or a question for the model. */
  async respond(sessionId: string, input: string): Promise<CommandReply> {
    const text = input.trim();
    if (text.length === 0) {
      return { text: '' };
    }
    if (text.startsWith('/')) {
      return this.runCommand(sessionId, text);
    }

    const outcome = await this.#orchestrator.runTurn(sessionId, text);
    if (!this.isDebug(sessionId)) {
      return { text: outcome.text };
    }
    return { text: `${formatTurnDebug(outcome)}\n\n${outcome.text}` };
  }

  async runCommand(sessionId: string, line: string): Promise<CommandReply> {
    const [rawName = '', ...args] = line.trim().split(/\s+/);
    // Telegram appends the bot name in groups: /help@my_bot
    const name = rawName.split('@')[0]?.toLowerCase() ?? '';
    const handler = Object.hasOwn(this.#commands, name) ? this.#commands[name] : undefined;
    if (!handler) {
      return { text: `Unknown command: ${name}. Type /help for the list of commands.` };
    }
    try {
      return await handler(sessionId, args);
    } catch (err) {
      return { text: `Error: ${describeError(err)}` };
    }
  }

  // ── Commands ──────────────────────────────────────────────────────────────

  #welcomeText(sessionId: string): string {
    return [
      'Welcome to the corporate assistant!',
      '',
      'I can help with:',
      '- Meeting planning and free time slots',
      '- Searching the corporate regulations',
      '- Your development plan',
      '',
      this.#helpText(sessionId),
    ].join('\n');
  }

  #helpText(sessionId: string): string {
    return [
      'Commands:',
      '/help - show this help',
      '/tools - list the available tools',
      '/slots - show free time slots',
      '/plan - show the development plan',
      '/search <query> - search the regulations',
      '/meet <date> <time> <title> - schedule a meeting',
      '/history - show the conversation history',
      '/clear - clear the history',
      '/debug - toggle debug mode',
      '/mode [structured|inline] - show or switch the tool-call mode',
      '/exit - leave',
      '',
      `Debug mode: ${this.isDebug(sessionId) ? 'ON' : 'OFF'}`,
      'Or just ask a question.',
    ].join('\n');
  }

  async #toolsCommand(): Promise<CommandReply> {
    const tools = await this.#orchestrator.listTools();
    if (tools.length === 0) {
      return { text: 'No tools available.' };
    }
    const lines = tools.map((tool, index) => `${index + 1}. ${tool.name} - ${tool.description}`);
    return { text: `Available tools:\n${lines.join('\n')}` };
  }

  async #slotsCommand(): Promise<CommandReply> {
    const result = await this.#tools.callTool('get_available_slots', {});
    const text = resultText(result);
    if (result.isError) return { text: `Error: ${text}` };

    const data = parseJson(text);
    const slots = isRecord(data) && Array.isArray(data.available_slots) ? data.available_slots.filter(isRecord) : [];
    if (slots.length === 0) {
      return { text: 'No free slots this week.' };
    }
    const lines = slots.map((slot) => {
      const day = typeof slot.day_of_week === 'string' ? ` (${slot.day_of_week})` : '';
      return `${String(slot.date)}${day}: ${stringList(slot.available_times).join(', ')}`;
    });
    return { text: `Free time slots:\n${lines.join('\n')}` };
  }

  async #planCommand(): Promise<CommandReply> {
    const result = await this.#tools.callTool('get_development_plan', {});
    const text = resultText(result);
    if (result.isError) return { text: `Error: ${text}` };

    const plan = parseJson(text);
    if (!isRecord(plan)) return { text };

    const lines = [
      'Development plan:',
      `Current level: ${String(plan.current_level)}`,
      `Target level: ${String(plan.target_level)}`,
    ];
    const skills = Array.isArray(plan.skills_to_develop) ? plan.skills_to_develop.filter(isRecord) : [];
    if (skills.length > 0) {
      lines.push('', 'Skills to develop:');
      for (const skill of skills) {
        lines.push(`- ${String(skill.skill)} (${String(skill.current_level)} -> ${String(skill.target_level)})`);
      }
    }
    if (typeof plan.next_review_date === 'string') {
      lines.push('', `Next review: ${plan.next_review_date}`);
    }
    return { text: lines.join('\n') };
  }

  async #searchCommand(args: string[]): Promise<CommandReply> {
    const query = args.join(' ');
    if (query.length === 0) {
      return { text: USAGE.search };
    }
    const result = await this.#tools.callTool('search_regulations', { query });
    const text = resultText(result);
    if (result.isError) return { text: `Error: ${text}` };

    const data = parseJson(text);
    const results = isRecord(data) && Array.isArray(data.results) ? data.results.filter(isRecord) : [];
    if (results.length === 0) {
      const suggestion = isRecord(data) && typeof data.suggestion === 'string' ? `\n${data.suggestion}` : '';
      return { text: `Nothing found for '${query}'.${suggestion}` };
    }
    const blocks = results.map((entry) => `Q: ${String(entry.question)}\nA: ${String(entry.answer)}`);
    return { text: `Results for '${query}':\n\n${blocks.join('\n\n')}` };
  }

  async #meetCommand(args: string[]): Promise<CommandReply> {
    const [date, time, ...titleWords] = args;
    if (date === undefined || time === undefined || titleWords.length === 0) {
      return { text: USAGE.meet };
    }
    const result = await this.#tools.callTool('schedule_meeting', { date, time, title: titleWords.join(' ') });
    const text = resultText(result);
    if (result.isError) return { text: `Error: ${text}` };

    const data = parseJson(text);
    if (!isRecord(data)) return { text };
    if (data.success === true) {
      return { text: `${String(data.message)} (id: ${String(data.meeting_id)})` };
    }
    const alternatives = stringList(data.available_alternatives);
    const hint = alternatives.length > 0 ? `\nAvailable that day: ${alternatives.join(', ')}` : '';
    return { text: `${String(data.message)}${hint}` };
  }

  #historyText(sessionId: string): string {
    const entries = this.#conversations.get(sessionId).recent(HISTORY_LIMIT);
    if (entries.length === 0) {
      return 'The conversation history is empty.';
    }
    const lines = entries.map(
      (entry, index) => `${index + 1}. [${entry.role}] ${truncate(entry.content, HISTORY_PREVIEW_CHARS)}`,
    );
    return `History (last ${HISTORY_LIMIT}):\n${lines.join('\n')}`;
  }

  #toggleDebug(sessionId: string): string {
    if (this.#debugSessions.delete(sessionId)) {
      return 'Debug mode: OFF\nTool activity is hidden.';
    }
    this.#debugSessions.add(sessionId);
    return 'Debug mode: ON\nYou will see which tools the assistant uses.';
  }

  #modeCommand(args: string[]): string {
    const [requested] = args;
    if (requested === undefined) {
      return `Tool-call mode: ${this.#orchestrator.toolCallMode}`;
    }
    const mode: ToolCallMode | null = parseToolCallMode(requested.toLowerCase());
    if (!mode) {
      return USAGE.mode;
    }
    this.#orchestrator.toolCallMode = mode;
    this.#orchestrator.refreshTools();
    return `Tool-call mode set to ${mode}.`;
  }
}

/** One line per executed tool call, for debug mode. */
export function formatTurnDebug(outcome: TurnOutcome): string {
  if (outcome.toolOutcomes.length === 0) {
    return '[debug] no tools used';
  }
  return outcome.toolOutcomes
    .map((tool) => {
      const status = tool.isError ? 'failed' : 'ok';
      return `[debug] ${tool.call.toolName}(${JSON.stringify(tool.call.arguments)}) ${status}: ${truncate(tool.text, DEBUG_PREVIEW_CHARS)}`;
    })
    .join('\n');
}
