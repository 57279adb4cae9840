import type { ToolCallRequest } from './types.js';

export const MARKER_PREFIX = '[TOOL_CALL:';
const NAME_DELIMITER = ':';
const MARKER_SUFFIX = ']';

/** One inline marker found in model text, with its span in the source string. */
export interface ToolMarker {
    call: ToolCallRequest;
    start: number;
    /** Index one past the closing `]`. */
    end: number;
    raw: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeMarkerArguments(blob: string): Record<string, unknown> {
    if (blob.trim().length === 0) return {};
    try {
        const parsed: unknown = JSON.parse(blob);
        return isRecord(parsed) ? parsed : {};
    } catch {
        return {};
    }
}

function isNameChar(char: string): boolean {
    return /[A-Za-z0-9_.-]/.test(char);
}

function skipWhitespace(text: string, from: number): number {
    let cursor = from;
    while (cursor < text.length && /\s/.test(text.charAt(cursor))) cursor++;
    return cursor;
}

/**
 * Index one past the `}` that balances the `{` at `open`, or -1 when the text
 * ends first. Braces inside JSON strings do not count.
 */
function findBalancedEnd(text: string, open: number): number {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = open; i < text.length; i++) {
        const char = text[i];
        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (char === '\\') {
                escaped = true;
            } else if (char === '"') {
                inString = false;
            }
            continue;
        }

        if (char === '"') {
            inString = true;
        } else if (char === '{') {
            depth++;
        } else if (char === '}') {
            depth--;
            if (depth === 0) return i + 1;
        }
    }
    return -1;
}

/**
 * Try to read one marker starting at `start` (which points at the prefix).
 * Returns null when the text there is not a complete marker.
 */
function readMarker(text: string, start: number): ToolMarker | null {
    let cursor = start + MARKER_PREFIX.length;

    const nameStart = cursor;
    while (cursor < text.length && isNameChar(text.charAt(cursor))) cursor++;
    const name = text.slice(nameStart, cursor);
    if (name.length === 0) return null;

    let blob = '';
    if (text.charAt(cursor) === NAME_DELIMITER) {
        cursor++;
        const blobStart = skipWhitespace(text, cursor);

        const blobEnd = text.charAt(blobStart) === '{' ? findBalancedEnd(text, blobStart) : -1;
        const afterBlob = blobEnd === -1 ? -1 : skipWhitespace(text, blobEnd);
        if (afterBlob !== -1 && text.charAt(afterBlob) === MARKER_SUFFIX) {
            blob = text.slice(blobStart, blobEnd);
            cursor = afterBlob;
        } else {
            // Unbalanced, followed by stray text, or not an object: everything up to
            // the next bracket is the blob, and decoding fails soft.
            const close = text.indexOf(MARKER_SUFFIX, blobStart);
            if (close === -1) return null;
            blob = text.slice(blobStart, close);
            cursor = close;
        }
    }

    cursor = skipWhitespace(text, cursor);
    if (text.charAt(cursor) !== MARKER_SUFFIX) return null;
    cursor++;

    return {
        call: { toolName: name, arguments: decodeMarkerArguments(blob) },
        start,
        end: cursor,
        raw: text.slice(start, cursor),
    };
}

/** Every well-formed `[TOOL_CALL:name:{json}]` marker in `text`, left to right. */
export function scanToolMarkers(text: string): ToolMarker[] {
    const markers: ToolMarker[] = [];
    let from = 0;

    while (from < text.length) {
        const start = text.indexOf(MARKER_PREFIX, from);
        if (start === -1) break;

        const marker = readMarker(text, start);
        if (marker) {
            markers.push(marker);
            from = marker.end;
        } else {
            from = start + MARKER_PREFIX.length;
        }
    }
    return markers;
}

export function extractToolCalls(text: string): ToolCallRequest[] {
    return scanToolMarkers(text).map((marker) => marker.call);
}

/** Replace each marker with its replacement, in order. `replacements[i]` belongs to `markers[i]`. */
export function substituteMarkers(text: string, markers: readonly ToolMarker[], replacements: readonly string[]): string {
    let result = '';
    let cursor = 0;
    markers.forEach((marker, index) => {
        result += text.slice(cursor, marker.start);
        result += replacements[index] ?? '';
        cursor = marker.end;
    });
    return result + text.slice(cursor);
}

export function stripToolMarkers(text: string): string {
    const markers = scanToolMarkers(text);
    if (markers.length === 0) return text;
    return substituteMarkers(text, markers, []).replace(/[ \t]{2,}/g, ' ').trim();
}
