import { PassThrough } from 'node:stream';
import { createInterface } from 'node:readline';
import { describe, expect, it } from 'vitest';
import { TransportClosedError } from '../../src/core/errors.js';
import { Orchestrator } from '../../src/core/orchestrator.js';
import { decodeEnvelope, encodeEnvelope } from '../../src/protocol/envelope.js';
import { LineTransport } from '../../src/protocol/line-transport.js';
import { CalendarStore } from '../../src/services/calendar-store.js';
import { ConversationStore } from '../../src/services/conversation-store.js';
import { loadCorporateData } from '../../src/services/corporate-data.js';
import { ToolHost } from '../../src/services/tool-host.js';
import { ToolHostClient } from '../../src/services/tool-host-client.js';
import { ToolRegistry } from '../../src/services/tool-registry.js';
import { connectInProcess, createCorporateHost } from '../harness/in-process-host.js';
import { ScriptedModel, textReply, toolReply } from '../harness/scripted-model.js';

function createEchoHost(): ReturnType<typeof createCorporateHost> {
  const data = loadCorporateData();
  const registry = new ToolRegistry();
  registry.register({
    name: 'echo',
    description: 'Return the given text.',
    parameters: { type: 'object', properties: { text: { type: 'string' } }, required: ['text'] },
    handler: (args) => (typeof args.text === 'string' ? args.text : ''),
  });
  const calendar = new CalendarStore(data.availableSlots);
  return { host: new ToolHost({ registry, calendar, data }), calendar, data, registry };
}

describe('end-to-end turns over the line protocol', () => {
  it('substitutes an inline echo result in place of its marker', async () => {
    const { client } = connectInProcess(createEchoHost());
    await client.connect();
    const model = new ScriptedModel([textReply('The tool says: [TOOL_CALL:echo:{"text":"hi"}]')]);
    const orchestrator = new Orchestrator({
      model,
      tools: client,
      conversations: new ConversationStore(),
      toolCallMode: 'inline',
    });

    const outcome = await orchestrator.runTurn('cli:local', 'Say hi');

    expect(outcome.state).toBe('DONE');
    expect(outcome.text).toBe('The tool says: hi');
    await client.close();
  });

  it('hands an unavailable booking back to the model as tool content', async () => {
    const { client, calendar } = connectInProcess();
    await client.connect();
    const model = new ScriptedModel([
      toolReply([{ toolName: 'schedule_meeting', arguments: { date: '2024-01-15', time: '13:00', title: 'Sync' } }]),
      textReply('13:00 is taken; 10:00-12:00 and 16:00-18:00 are free.'),
    ]);
    const orchestrator = new Orchestrator({ model, tools: client, conversations: new ConversationStore() });

    const outcome = await orchestrator.runTurn('cli:local', 'Book a sync on Monday at 13:00');

    expect(outcome.state).toBe('DONE');
    expect(outcome.toolOutcomes[0]?.isError).toBe(false);
    const toolMessage = model.requests[1]?.messages.find((message) => message.role === 'tool');
    expect(JSON.parse(toolMessage?.content ?? '')).toEqual({
      success: false,
      message: 'The time slot 2024-01-15 at 13:00 is not available',
      available_alternatives: ['10:00-12:00', '16:00-18:00'],
    });
    expect(calendar.bookings()).toEqual([]);
    await client.close();
  });

  it('fails the turn once when the host goes away mid-call and keeps the history', async () => {
    const { host } = createCorporateHost();
    const clientToHost = new PassThrough();
    const hostToClient = new PassThrough();

    // A host that answers everything except tools/call, where it hangs up.
    const requests = createInterface({ input: clientToHost });
    requests.on('line', (line) => {
      const envelope = decodeEnvelope(line);
      if ('method' in envelope && envelope.method === 'tools/call') {
        setImmediate(() => hostToClient.end());
        return;
      }
      void host.handle(envelope).then((response) => {
        if (response) hostToClient.write(`${encodeEnvelope(response)}\n`);
      });
    });

    const client = new ToolHostClient(new LineTransport({ input: hostToClient, output: clientToHost }));
    await client.connect();
    const conversations = new ConversationStore();
    const model = new ScriptedModel([toolReply([{ toolName: 'get_development_plan', arguments: {} }])]);
    const orchestrator = new Orchestrator({ model, tools: client, conversations });

    const outcome = await orchestrator.runTurn('cli:local', 'Show my plan');

    expect(outcome.state).toBe('FAILED');
    expect(outcome.text).toBe('Error: Stream ended.');
    expect(outcome.error).toBeInstanceOf(TransportClosedError);
    expect(outcome.trace).toEqual(['AWAITING_MODEL', 'INTERPRETING_RESPONSE', 'EXECUTING_TOOLS', 'FAILED']);
    expect(client.state).toBe('closed');
    expect(conversations.get('cli:local').all()).toEqual([{ role: 'user', content: 'Show my plan' }]);
    await client.close();
    requests.close();

    // The next turn, over a fresh connection, still sees the earlier message.
    const { client: nextClient } = connectInProcess();
    await nextClient.connect();
    const nextModel = new ScriptedModel([textReply('Here it is.')]);
    const next = new Orchestrator({ model: nextModel, tools: nextClient, conversations });

    await expect(next.runTurn('cli:local', 'Try again')).resolves.toMatchObject({ state: 'DONE', text: 'Here it is.' });
    expect(nextModel.requests[0]?.messages.slice(1).map((message) => message.content)).toEqual(['Show my plan', 'Try again']);
    await nextClient.close();
  });
});
