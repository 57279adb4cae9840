import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

/** JSON-RPC error codes used on the wire. */
export const RPC_ERROR_CODES = {
    ParseError: ErrorCode.ParseError,
    InvalidRequest: ErrorCode.InvalidRequest,
    MethodNotFound: ErrorCode.MethodNotFound,
    InvalidParams: ErrorCode.InvalidParams,
    InternalError: ErrorCode.InternalError,
} as const;

export type ToolBridgeErrorKind =
    | 'ProtocolParseError'
    | 'DuplicateToolError'
    | 'UnknownToolError'
    | 'MethodNotFound'
    | 'ToolExecutionFault'
    | 'TransportClosedError'
    | 'TransportWriteError'
    | 'ModelEndpointError'
    | 'RpcError';

export abstract class ToolBridgeError extends Error {
    abstract readonly kind: ToolBridgeErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** A wire line that could not be decoded into an envelope. */
export class ProtocolParseError extends ToolBridgeError {
    readonly kind = 'ProtocolParseError';

    /**
     * @param rawLine   - The offending line, as received.
     * @param requestId - Id recovered from the line, or null when it could not be determined.
     * @param code      - ParseError for malformed JSON, InvalidRequest for a well-formed non-envelope.
     */
    constructor(
        message: string,
        readonly rawLine: string,
        readonly requestId: number | string | null = null,
        readonly code: number = RPC_ERROR_CODES.ParseError,
    ) {
        super(message);
    }
}

export class DuplicateToolError extends ToolBridgeError {
    readonly kind = 'DuplicateToolError';

    constructor(readonly toolName: string) {
        super(`Tool '${toolName}' is already registered.`);
    }
}

export class UnknownToolError extends ToolBridgeError {
    readonly kind = 'UnknownToolError';

    constructor(readonly toolName: string) {
        super(`Unknown tool: ${toolName}`);
    }
}

export class MethodNotFoundError extends ToolBridgeError {
    readonly kind = 'MethodNotFound';

    constructor(readonly method: string) {
        super(`Method not found: ${method}`);
    }
}

/** Raised by tool handlers; the host turns it into an error result. */
export class ToolExecutionFault extends ToolBridgeError {
    readonly kind = 'ToolExecutionFault';
}

export class TransportClosedError extends ToolBridgeError {
    readonly kind = 'TransportClosedError';
}

export class TransportWriteError extends ToolBridgeError {
    readonly kind = 'TransportWriteError';
}

export class ModelEndpointError extends ToolBridgeError {
    readonly kind = 'ModelEndpointError';

    constructor(message: string, readonly statusCode: number | null = null, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** An error envelope returned by the tool host. */
export class RpcError extends ToolBridgeError {
    readonly kind = 'RpcError';

    constructor(readonly code: number, message: string) {
        super(message);
    }
}

/** Transport and endpoint faults end the current turn; everything else is recoverable. */
export function isTurnFatal(error: unknown): boolean {
    return (
        error instanceof TransportClosedError ||
        error instanceof TransportWriteError ||
        error instanceof ModelEndpointError
    );
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
