import { describe, expect, it } from 'vitest';
import { ProtocolParseError, RPC_ERROR_CODES } from '../../src/core/errors.js';
import {
  createFailure,
  createRequest,
  createSuccess,
  decodeEnvelope,
  encodeEnvelope,
  isFailure,
  isNotification,
  isRequest,
  isResponse,
  isSuccess,
} from '../../src/protocol/envelope.js';

function parseFailure(line: string): ProtocolParseError {
  try {
    decodeEnvelope(line);
  } catch (err) {
    if (err instanceof ProtocolParseError) return err;
    throw err;
  }
  throw new Error(`expected '${line}' to be rejected`);
}

describe('encodeEnvelope', () => {
  it('writes one line with the jsonrpc tag', () => {
    const line = encodeEnvelope(createRequest(1, 'tools/list'));

    expect(line).toBe('{"jsonrpc":"2.0","id":1,"method":"tools/list"}');
  });

  it('escapes newlines inside string values', () => {
    const line = encodeEnvelope(createSuccess(7, { text: 'first\nsecond' }));

    expect(line).not.toContain('\n');
    expect(line).toBe('{"jsonrpc":"2.0","id":7,"result":{"text":"first\\nsecond"}}');
  });

  it('keeps a null id on failures', () => {
    expect(encodeEnvelope(createFailure(null, -32700, 'Parse error'))).toBe(
      '{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Parse error"}}',
    );
  });
});

describe('decodeEnvelope', () => {
  it('classifies requests, notifications and responses', () => {
    const request = decodeEnvelope('{"jsonrpc":"2.0","id":3,"method":"tools/call","params":{"name":"list_tools"}}');
    const notification = decodeEnvelope('{"jsonrpc":"2.0","method":"notifications/initialized"}');
    const success = decodeEnvelope('{"jsonrpc":"2.0","id":3,"result":{"ok":true}}');
    const failure = decodeEnvelope('{"jsonrpc":"2.0","id":"a","error":{"code":-32601,"message":"Method not found: x"}}');

    expect(isRequest(request)).toBe(true);
    expect(request).toEqual({ jsonrpc: '2.0', id: 3, method: 'tools/call', params: { name: 'list_tools' } });
    expect(isNotification(notification)).toBe(true);
    expect(isRequest(notification)).toBe(false);
    expect(isResponse(success) && isSuccess(success)).toBe(true);
    expect(isResponse(failure) && isFailure(failure)).toBe(true);
    expect(failure).toEqual({ jsonrpc: '2.0', id: 'a', error: { code: -32601, message: 'Method not found: x' } });
  });

  it('accepts an envelope without the jsonrpc tag', () => {
    expect(decodeEnvelope('{"id":1,"result":null}')).toEqual({ jsonrpc: '2.0', id: 1, result: null });
  });

  it('lets a non-null error win over a result and ignores error: null', () => {
    expect(decodeEnvelope('{"id":2,"result":1,"error":null}')).toEqual({ jsonrpc: '2.0', id: 2, result: 1 });
    expect(isFailure(decodeEnvelope('{"id":2,"result":1,"error":{"code":-32603,"message":"boom"}}'))).toBe(true);
  });

  it('reports malformed JSON as a parse error without an id', () => {
    const error = parseFailure('{"id":1,');

    expect(error.code).toBe(RPC_ERROR_CODES.ParseError);
    expect(error.requestId).toBeNull();
    expect(error.rawLine).toBe('{"id":1,');
    expect(error.message.startsWith('Parse error:')).toBe(true);
  });

  it('reports well-formed non-envelopes as invalid requests', () => {
    expect(parseFailure('[1,2]').code).toBe(RPC_ERROR_CODES.InvalidRequest);
    expect(parseFailure('{"id":4}').message).toBe('Invalid request: a response carries a result or an error');
  });

  it('recovers the id of an invalid request when it can', () => {
    const error = parseFailure('{"id":9,"method":""}');

    expect(error.requestId).toBe(9);
    expect(error.message).toBe('Invalid request: method must be a non-empty string');
  });

  it('rejects other protocol versions and non-object params', () => {
    expect(parseFailure('{"jsonrpc":"1.0","id":1,"method":"x"}').message).toBe(
      "Invalid request: unsupported jsonrpc version '1.0'",
    );
    expect(parseFailure('{"id":1,"method":"x","params":[1]}').message).toBe('Invalid request: params must be an object');
  });
});
