import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { ProtocolParseError, TransportClosedError, TransportWriteError } from '../../src/core/errors.js';
import { createRequest } from '../../src/protocol/envelope.js';
import { LineTransport } from '../../src/protocol/line-transport.js';

async function openTransport(): Promise<{ transport: LineTransport; input: PassThrough; output: PassThrough }> {
  const input = new PassThrough();
  const output = new PassThrough();
  const transport = new LineTransport({ input, output });
  await transport.start();
  return { transport, input, output };
}

describe('LineTransport', () => {
  it('reassembles a line split across chunks', async () => {
    const { transport, input } = await openTransport();

    input.write('{"jsonrpc":"2.0","id":1,');
    input.write('"result":{"ok":true}}\n');

    await expect(transport.receive()).resolves.toEqual({ jsonrpc: '2.0', id: 1, result: { ok: true } });
  });

  it('hands out several lines from one chunk in order and skips blank lines', async () => {
    const { transport, input } = await openTransport();

    input.write('{"id":1,"result":"a"}\r\n\n   \n{"id":2,"result":"b"}\n');

    await expect(transport.receive()).resolves.toEqual({ jsonrpc: '2.0', id: 1, result: 'a' });
    await expect(transport.receive()).resolves.toEqual({ jsonrpc: '2.0', id: 2, result: 'b' });
  });

  it('surfaces a bad line as a parse error and keeps reading', async () => {
    const { transport, input } = await openTransport();

    input.write('not json\n{"id":5,"result":5}\n');

    await expect(transport.receive()).rejects.toBeInstanceOf(ProtocolParseError);
    await expect(transport.receive()).resolves.toEqual({ jsonrpc: '2.0', id: 5, result: 5 });
  });

  it('writes one newline-terminated line per envelope', async () => {
    const { transport, output } = await openTransport();

    await transport.send(createRequest(1, 'tools/list'));

    expect(String(output.read())).toBe('{"jsonrpc":"2.0","id":1,"method":"tools/list"}\n');
  });

  it('delivers a final unterminated line, then reports the stream as closed', async () => {
    const { transport, input } = await openTransport();

    input.end('{"id":3,"result":3}');

    await expect(transport.receive()).resolves.toEqual({ jsonrpc: '2.0', id: 3, result: 3 });
    await expect(transport.receive()).rejects.toBeInstanceOf(TransportClosedError);
    expect(transport.isOpen).toBe(false);
  });

  it('rejects a pending receive when the input ends', async () => {
    const { transport, input } = await openTransport();

    const pending = transport.receive();
    input.end();

    await expect(pending).rejects.toBeInstanceOf(TransportClosedError);
  });

  it('refuses to send after stop and cannot restart', async () => {
    const { transport } = await openTransport();

    const pending = transport.receive();
    await transport.stop();

    await expect(pending).rejects.toBeInstanceOf(TransportClosedError);
    await expect(transport.send(createRequest(2, 'tools/list'))).rejects.toBeInstanceOf(TransportWriteError);
    await expect(transport.start()).rejects.toBeInstanceOf(TransportClosedError);
  });

  it('refuses to send before start', async () => {
    const transport = new LineTransport({ input: new PassThrough(), output: new PassThrough() });

    await expect(transport.send(createRequest(1, 'initialize'))).rejects.toThrow('Cannot write: transport is not open.');
  });
});
