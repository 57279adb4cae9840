import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ProtocolParseError, TransportClosedError, TransportWriteError } from '../../src/core/errors.js';
import { createRequest, createSuccess } from '../../src/protocol/envelope.js';
import { ProcessTransport } from '../../src/protocol/process-transport.js';

const { FakeStdioTransport } = vi.hoisted(() => {
  interface StdioParams {
    command: string;
    args?: string[];
    env?: Record<string, string>;
    cwd?: string;
    stderr?: string;
  }

  class FakeStdioTransport {
    static instances: FakeStdioTransport[] = [];
    readonly sent: unknown[] = [];
    closeCalls = 0;
    onmessage?: (message: unknown) => void;
    onerror?: (error: Error) => void;
    onclose?: () => void;
    readonly stderr = null;

    constructor(readonly params: StdioParams) {
      FakeStdioTransport.instances.push(this);
    }

    async start(): Promise<void> {
      if (this.params.command === 'missing') {
        throw new Error('spawn missing ENOENT');
      }
    }

    async send(message: unknown): Promise<void> {
      this.sent.push(message);
    }

    async close(): Promise<void> {
      this.closeCalls += 1;
      this.onclose?.();
    }
  }

  return { FakeStdioTransport };
});

vi.mock('@modelcontextprotocol/sdk/client/stdio.js', () => ({ StdioClientTransport: FakeStdioTransport }));

function lastStdio(): InstanceType<typeof FakeStdioTransport> {
  const stdio = FakeStdioTransport.instances.at(-1);
  if (!stdio) throw new Error('no stdio transport was created');
  return stdio;
}

beforeEach(() => {
  FakeStdioTransport.instances = [];
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe('ProcessTransport', () => {
  it('spawns the command with piped stderr and the parent environment underneath its own', () => {
    vi.stubEnv('TOOLBRIDGE_PARENT_VAR', 'from-parent');

    new ProcessTransport({ command: 'node', args: ['host.js'], env: { EXTRA_VAR: 'from-options' }, cwd: '/srv' });

    expect(lastStdio().params).toMatchObject({
      command: 'node',
      args: ['host.js'],
      cwd: '/srv',
      stderr: 'pipe',
      env: expect.objectContaining({ TOOLBRIDGE_PARENT_VAR: 'from-parent', EXTRA_VAR: 'from-options' }),
    });
  });

  it('writes envelopes as JSON-RPC messages once started', async () => {
    const transport = new ProcessTransport({ command: 'node', args: [] });

    await expect(transport.send(createRequest(1, 'tools/list', {}))).rejects.toThrow(
      'Cannot write: transport is not open.',
    );

    await transport.start();
    await transport.send(createRequest(1, 'tools/list', {}));

    expect(transport.isOpen).toBe(true);
    expect(lastStdio().sent).toEqual([{ jsonrpc: '2.0', id: 1, method: 'tools/list', params: {} }]);
  });

  it('hands incoming messages to receive in order', async () => {
    const transport = new ProcessTransport({ command: 'node', args: [] });
    await transport.start();

    const pending = transport.receive();
    lastStdio().onmessage?.({ jsonrpc: '2.0', id: 1, result: { tools: [] } });
    lastStdio().onmessage?.({ jsonrpc: '2.0', id: 2, result: {} });

    await expect(pending).resolves.toEqual(createSuccess(1, { tools: [] }));
    await expect(transport.receive()).resolves.toEqual(createSuccess(2, {}));
  });

  it('turns an unreadable line into a parse error for the next receive', async () => {
    const transport = new ProcessTransport({ command: 'node', args: [] });
    await transport.start();

    lastStdio().onerror?.(new SyntaxError('Unexpected token x in JSON'));

    const failure = await transport.receive().catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(ProtocolParseError);
    expect(failure).toMatchObject({ message: 'Parse error: Unexpected token x in JSON' });
  });

  it('refuses writes after the process reports a fault', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const transport = new ProcessTransport({ command: 'node', args: [] });
    await transport.start();

    lastStdio().onerror?.(new Error('EPIPE'));

    expect(errors).toHaveBeenCalledWith('[ProcessTransport] Tool host error: EPIPE');
    const failure = await transport.send(createRequest(2, 'tools/list')).catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(TransportWriteError);
    expect(failure).toMatchObject({ message: 'Cannot write: EPIPE' });
  });

  it('rejects a pending receive when the process exits', async () => {
    const transport = new ProcessTransport({ command: 'node', args: [] });
    await transport.start();

    const pending = transport.receive();
    lastStdio().onclose?.();

    await expect(pending).rejects.toThrow(new TransportClosedError('Stream ended.'));
    expect(transport.isOpen).toBe(false);
  });

  it('reports a command that cannot be spawned', async () => {
    const transport = new ProcessTransport({ command: 'missing', args: [] });

    await expect(transport.start()).rejects.toThrow("Failed to start tool host 'missing': spawn missing ENOENT");
    expect(transport.isOpen).toBe(false);
  });

  it('stops once and cannot be restarted', async () => {
    const transport = new ProcessTransport({ command: 'node', args: [] });
    await transport.start();

    await transport.stop();
    await transport.stop();

    expect(lastStdio().closeCalls).toBe(1);
    await expect(transport.start()).rejects.toBeInstanceOf(TransportClosedError);
    await expect(transport.receive()).rejects.toThrow('Transport is closed.');
  });
});
