import type { ConversationMessage, InlineFinalization, ToolCallMode, ToolCallRequest, ToolDescriptor } from './types.js';
import { describeError } from './errors.js';
import { assembleContext, buildSystemPrompt } from './context-assembly.js';
import { LaneExecutor, type ToolInvoker, type ToolOutcome } from './lane-executor.js';
import { scanToolMarkers, stripToolMarkers, substituteMarkers, type ToolMarker } from './tool-call-scanner.js';
import type { ConversationStore } from '../services/conversation-store.js';
import type { ModelClient } from '../services/model-client.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

export type TurnState = 'AWAITING_MODEL' | 'INTERPRETING_RESPONSE' | 'EXECUTING_TOOLS' | 'DONE' | 'FAILED';

export const EMPTY_ANSWER = '(no response)';

/** The tool side of a turn: the catalog plus execution. `ToolHostClient` fits. */
export interface ToolGateway extends ToolInvoker {
  listTools(): Promise<ToolDescriptor[]>;
}

export interface OrchestratorOptions {
  model: ModelClient;
  tools: ToolGateway;
  conversations: ConversationStore;
  toolCallMode?: ToolCallMode;
  /** Tool batches per turn before the next reply is taken as final. */
  maxToolRounds?: number;
  historyWindow?: number;
  inlineFinalization?: InlineFinalization;
  onStateChange?: (state: TurnState, sessionId: string) => void;
}

export interface TurnOptions {
  toolCallMode?: ToolCallMode;
}

export interface TurnOutcome {
  state: 'DONE' | 'FAILED';
  /** The final answer, or the single user-visible error message. */
  text: string;
  trace: TurnState[];
  toolOutcomes: ToolOutcome[];
  error?: unknown;
}

interface InterpretedReply {
  calls: ToolCallRequest[];
  markers: ToolMarker[];
}

/**
 * Drives one user turn between the model and the tool host:
 * AWAITING_MODEL → INTERPRETING_RESPONSE → (EXECUTING_TOOLS → AWAITING_MODEL)* → DONE | FAILED.
 *
 * Tool faults turn into conversation content; only transport and model
 * endpoint faults end the turn in FAILED. Either way the user message is kept
 * in the session history.
 */
export class Orchestrator {
  readonly #model: ModelClient;
  readonly #tools: ToolGateway;
  readonly #conversations: ConversationStore;
  readonly #laneExecutor: LaneExecutor;
  readonly #maxToolRounds: number;
  readonly #historyWindow: number;
  readonly #inlineFinalization: InlineFinalization;
  readonly #onStateChange: ((state: TurnState, sessionId: string) => void) | undefined;
  #toolCallMode: ToolCallMode;
  #catalog: Promise<ToolDescriptor[]> | null = null;

  constructor(options: OrchestratorOptions) {
    this.#model = options.model;
    this.#tools = options.tools;
    this.#conversations = options.conversations;
    this.#laneExecutor = new LaneExecutor(options.tools);
    this.#toolCallMode = options.toolCallMode ?? 'structured';
    this.#maxToolRounds = Math.max(0, options.maxToolRounds ?? 1);
    this.#historyWindow = options.historyWindow ?? 6;
    this.#inlineFinalization = options.inlineFinalization ?? 'substitute';
    this.#onStateChange = options.onStateChange;
  }

  get toolCallMode(): ToolCallMode {
    return this.#toolCallMode;
  }

  set toolCallMode(mode: ToolCallMode) {
    this.#toolCallMode = mode;
  }

  /** Forget the cached catalog so the next turn asks the host again. */
  refreshTools(): void {
    this.#catalog = null;
  }

  async listTools(): Promise<ToolDescriptor[]> {
    if (!this.#catalog) {
      this.#catalog = this.#tools.listTools().catch((err: unknown) => {
        this.#catalog = null;
        throw err;
      });
    }
    return this.#catalog;
  }

  async runTurn(sessionId: string, userMessage: string, options: TurnOptions = {}): Promise<TurnOutcome> {
    const mode = options.toolCallMode ?? this.#toolCallMode;
    const history = this.#conversations.get(sessionId);
    const trace: TurnState[] = [];
    const toolOutcomes: ToolOutcome[] = [];
    const transition = (state: TurnState): void => {
      trace.push(state);
      this.#onStateChange?.(state, sessionId);
      void logThought(`[Orchestrator] ${sessionId} → ${state}`);
    };

    try {
      const tools = await this.listTools();
      const messages = assembleContext(
        buildSystemPrompt(tools, mode),
        history.recent(this.#historyWindow),
        userMessage,
      );
      const turnMessages: ConversationMessage[] = [];
      let rounds = 0;
      let finalText: string;

      for (;;) {
        transition('AWAITING_MODEL');
        const reply = await this.#model.complete({
          messages,
          tools: mode === 'structured' ? tools : undefined,
        });

        transition('INTERPRETING_RESPONSE');
        const { calls, markers } = this.#interpret(reply.content, reply.toolCalls, mode);
        if (calls.length === 0) {
          finalText = reply.content;
          break;
        }
        if (rounds >= this.#maxToolRounds) {
          await logThought(
            `[Orchestrator] ${sessionId}: reply still requests ${calls.length} tool call(s) after ${rounds} round(s); surfacing its text.`,
          );
          finalText = mode === 'inline' ? stripToolMarkers(reply.content) : reply.content;
          break;
        }

        transition('EXECUTING_TOOLS');
        rounds++;
        const outcomes = await this.#laneExecutor.executeToolCalls(calls);
        toolOutcomes.push(...outcomes);

        if (mode === 'structured') {
          const identified = calls.map((call, index) => ({ ...call, id: call.id ?? `call_${rounds}_${index}` }));
          const assistantMessage: ConversationMessage = {
            role: 'assistant',
            content: reply.content,
            toolCalls: identified,
          };
          messages.push(assistantMessage);
          turnMessages.push(assistantMessage);
          outcomes.forEach((outcome, index) => {
            const toolMessage: ConversationMessage = {
              role: 'tool',
              content: outcome.text,
              toolName: outcome.call.toolName,
              toolCallId: identified[index]?.id,
            };
            messages.push(toolMessage);
            turnMessages.push(toolMessage);
          });
          continue;
        }

        const toolMessages = outcomes.map((outcome): ConversationMessage => ({
          role: 'tool',
          content: outcome.text,
          toolName: outcome.call.toolName,
        }));
        turnMessages.push(...toolMessages);

        if (this.#inlineFinalization === 'substitute') {
          finalText = substituteMarkers(
            reply.content,
            markers,
            outcomes.map((outcome) => outcome.text),
          );
          break;
        }
        messages.push({ role: 'assistant', content: reply.content }, ...toolMessages);
      }

      const answer = finalText.trim().length > 0 ? finalText : EMPTY_ANSWER;
      transition('DONE');

      history.append('user', userMessage);
      for (const message of turnMessages) {
        const { role, content, ...extras } = message;
        history.append(role, content, extras);
      }
      history.append('assistant', answer);
      return { state: 'DONE', text: answer, trace, toolOutcomes };
    } catch (err) {
      transition('FAILED');
      history.append('user', userMessage);
      const reason = scrubSensitiveText(describeError(err));
      console.error(`[Orchestrator] Turn failed for ${sessionId}: ${reason}`);
      return { state: 'FAILED', text: `Error: ${reason}`, trace, toolOutcomes, error: err };
    }
  }

  #interpret(content: string, structuredCalls: ToolCallRequest[], mode: ToolCallMode): InterpretedReply {
    if (mode === 'structured') {
      return { calls: structuredCalls, markers: [] };
    }
    const markers = scanToolMarkers(content);
    return { calls: markers.map((marker) => marker.call), markers };
  }
}
