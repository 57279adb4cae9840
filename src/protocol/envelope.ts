import { ProtocolParseError, RPC_ERROR_CODES } from '../core/errors.js';
import type {
    RpcEnvelope,
    RpcErrorBody,
    RpcFailure,
    RpcId,
    RpcNotification,
    RpcRequest,
    RpcResponse,
    RpcSuccess,
} from '../types/protocol.js';

const JSONRPC_VERSION = '2.0';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRpcId(value: unknown): value is RpcId {
    return typeof value === 'number' || typeof value === 'string';
}

function isErrorBody(value: unknown): value is RpcErrorBody {
    return isRecord(value) && typeof value.code === 'number' && typeof value.message === 'string';
}

export function isRequest(envelope: RpcEnvelope): envelope is RpcRequest {
    return 'method' in envelope && 'id' in envelope;
}

export function isNotification(envelope: RpcEnvelope): envelope is RpcNotification {
    return 'method' in envelope && !('id' in envelope);
}

export function isResponse(envelope: RpcEnvelope): envelope is RpcResponse {
    return !('method' in envelope);
}

export function isFailure(envelope: RpcEnvelope): envelope is RpcFailure {
    return 'error' in envelope;
}

export function isSuccess(envelope: RpcEnvelope): envelope is RpcSuccess {
    return 'result' in envelope;
}

export function createRequest(id: RpcId, method: string, params?: Record<string, unknown>): RpcRequest {
    return params === undefined
        ? { jsonrpc: JSONRPC_VERSION, id, method }
        : { jsonrpc: JSONRPC_VERSION, id, method, params };
}

export function createSuccess(id: RpcId, result: unknown): RpcSuccess {
    return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function createFailure(id: RpcId | null, code: number, message: string): RpcFailure {
    return { jsonrpc: JSONRPC_VERSION, id, error: { code, message } };
}

/**
 * Serialize an envelope to exactly one line (without the trailing newline).
 * JSON.stringify escapes control characters inside strings, so the output never
 * contains a raw `\n`.
 */
export function encodeEnvelope(envelope: RpcEnvelope): string {
    return JSON.stringify({ ...envelope, jsonrpc: JSONRPC_VERSION });
}

/** Decode one wire line. Throws `ProtocolParseError` for anything that is not an envelope. */
export function decodeEnvelope(line: string): RpcEnvelope {
    let parsed: unknown;
    try {
        parsed = JSON.parse(line);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ProtocolParseError(`Parse error: ${reason}`, line);
    }
    return toEnvelope(parsed, line);
}

/**
 * Validate an already-parsed value as an envelope. `line` is the text it came
 * from, kept on the `ProtocolParseError` for diagnostics.
 */
export function toEnvelope(parsed: unknown, line: string = JSON.stringify(parsed)): RpcEnvelope {
    if (!isRecord(parsed)) {
        throw new ProtocolParseError('Invalid request: expected a JSON object', line, null, RPC_ERROR_CODES.InvalidRequest);
    }

    const id = parsed.id;
    const recoveredId = isRpcId(id) ? id : null;
    const invalid = (reason: string): ProtocolParseError =>
        new ProtocolParseError(`Invalid request: ${reason}`, line, recoveredId, RPC_ERROR_CODES.InvalidRequest);

    if (parsed.jsonrpc !== undefined && parsed.jsonrpc !== JSONRPC_VERSION) {
        throw invalid(`unsupported jsonrpc version '${String(parsed.jsonrpc)}'`);
    }

    if ('method' in parsed) {
        const method = parsed.method;
        const params = parsed.params;
        if (typeof method !== 'string' || method.length === 0) {
            throw invalid('method must be a non-empty string');
        }
        if (params !== undefined && !isRecord(params)) {
            throw invalid('params must be an object');
        }

        if (!('id' in parsed)) {
            return params === undefined
                ? { jsonrpc: JSONRPC_VERSION, method }
                : { jsonrpc: JSONRPC_VERSION, method, params };
        }
        if (!isRpcId(id)) {
            throw invalid('request id must be a number or a string');
        }
        return createRequest(id, method, params);
    }

    // Some peers write `error: null` next to a result; a non-null error wins.
    const error = parsed.error;
    if (error !== undefined && error !== null) {
        if (!isErrorBody(error)) {
            throw invalid('error must carry a numeric code and a message');
        }
        if (id !== null && !isRpcId(id)) {
            throw invalid('response id must be a number, a string or null');
        }
        return createFailure(recoveredId, error.code, error.message);
    }

    if (!('result' in parsed)) {
        throw invalid('a response carries a result or an error');
    }
    if (!isRpcId(id)) {
        throw invalid('response id must be a number or a string');
    }
    return createSuccess(id, parsed.result);
}
