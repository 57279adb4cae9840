import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

export interface Regulation {
    topic: string;
    question: string;
    answer: string;
}

export interface SynonymGroup {
    key: string;
    values: string[];
}

/** The mock corporate dataset the host's tools read from. */
export interface CorporateData {
    timezoneNote: string;
    /** ISO date → free ranges such as `"10:00-12:00"`. */
    availableSlots: Record<string, string[]>;
    developmentPlan: Record<string, unknown>;
    regulations: Regulation[];
    synonyms: SynonymGroup[];
    searchSuggestions: string[];
}

// src/services → ../../data, and the same from dist/services after a build.
export const DEFAULT_DATA_PATH = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '..',
    '..',
    'data',
    'corporate.json',
);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isRegulation(value: unknown): value is Regulation {
    return (
        isRecord(value) &&
        typeof value.topic === 'string' &&
        typeof value.question === 'string' &&
        typeof value.answer === 'string'
    );
}

function isSynonymGroup(value: unknown): value is SynonymGroup {
    return isRecord(value) && typeof value.key === 'string' && isStringArray(value.values);
}

/** Validate an already-parsed document. Throws on the first malformed section. */
export function parseCorporateData(raw: unknown, source = 'corporate data'): CorporateData {
    if (!isRecord(raw)) {
        throw new Error(`[CorporateData] ${source}: expected a JSON object.`);
    }

    const slots = raw.availableSlots;
    if (!isRecord(slots)) {
        throw new Error(`[CorporateData] ${source}: 'availableSlots' must be an object.`);
    }
    const availableSlots: Record<string, string[]> = {};
    for (const [date, ranges] of Object.entries(slots)) {
        if (!isStringArray(ranges)) {
            throw new Error(`[CorporateData] ${source}: slots for ${date} must be a list of strings.`);
        }
        availableSlots[date] = [...ranges];
    }

    const plan = raw.developmentPlan;
    if (!isRecord(plan)) {
        throw new Error(`[CorporateData] ${source}: 'developmentPlan' must be an object.`);
    }

    const regulations = raw.regulations;
    if (!Array.isArray(regulations) || !regulations.every(isRegulation)) {
        throw new Error(`[CorporateData] ${source}: 'regulations' must be a list of {topic, question, answer}.`);
    }

    const synonyms = raw.synonyms ?? [];
    if (!Array.isArray(synonyms) || !synonyms.every(isSynonymGroup)) {
        throw new Error(`[CorporateData] ${source}: 'synonyms' must be a list of {key, values}.`);
    }

    const suggestions = raw.searchSuggestions ?? [];
    if (!isStringArray(suggestions)) {
        throw new Error(`[CorporateData] ${source}: 'searchSuggestions' must be a list of strings.`);
    }

    return {
        timezoneNote: typeof raw.timezoneNote === 'string' ? raw.timezoneNote : '',
        availableSlots,
        developmentPlan: plan,
        regulations,
        synonyms,
        searchSuggestions: suggestions,
    };
}

export function loadCorporateData(filePath: string = DEFAULT_DATA_PATH): CorporateData {
    const text = readFileSync(filePath, 'utf8');
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new Error(`[CorporateData] Failed to parse ${filePath}: ${message}`, { cause: err });
    }
    return parseCorporateData(parsed, filePath);
}
