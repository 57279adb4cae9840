import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { logThought } from '../utils/logger.js';
import type { ChatCommands } from './chat-commands.js';

export const CLI_SESSION_ID = 'cli:local';

export interface ChatReplOptions {
  commands: ChatCommands;
  input?: Readable;
  output?: Writable;
  sessionId?: string;
  prompt?: string;
}

/**
 * Interactive terminal chat. Lines are handled one at a time: the next prompt
 * appears only after the previous turn finished. Resolves on /exit, /quit or
 * end of input.
 */
export async function startChatRepl(options: ChatReplOptions): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const sessionId = options.sessionId ?? CLI_SESSION_ID;
  const prompt = options.prompt ?? 'You: ';
  const write = (text: string): void => {
    output.write(`${text}\n`);
  };

  const rl = createInterface({ input, output, terminal: false });
  await logThought(`[ChatRepl] Session ${sessionId} started.`);
  write('Corporate assistant chat. Type /help for commands, /exit to leave.');
  output.write(prompt);

  try {
    for await (const line of rl) {
      if (line.trim().length === 0) {
        output.write(prompt);
        continue;
      }

      const reply = await options.commands.respond(sessionId, line);
      write(`\nAssistant: ${reply.text}\n`);
      if (reply.exit) break;
      output.write(prompt);
    }
  } finally {
    rl.close();
    await logThought(`[ChatRepl] Session ${sessionId} ended.`);
  }
}
