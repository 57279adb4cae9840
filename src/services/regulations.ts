import type { Regulation, SynonymGroup } from './corporate-data.js';

/** Lowercase, treat `-`/`_` as spaces, collapse whitespace. */
export function normalizeText(text: string): string {
    return text.toLowerCase().replace(/[-_]/g, ' ').split(/\s+/).filter(Boolean).join(' ');
}

/**
 * The normalized query, the synonyms of the first group that matches it (either
 * containing the other), and its separate words when there is more than one.
 */
export function searchKeywords(query: string, synonyms: readonly SynonymGroup[]): string[] {
    const normalized = normalizeText(query);
    const keywords = [normalized];

    const group = synonyms.find(({ key }) => {
        const normalizedKey = normalizeText(key);
        return normalized.includes(normalizedKey) || normalizedKey.includes(normalized);
    });
    if (group) {
        keywords.push(...group.values.map(normalizeText));
    }

    const words = normalized.split(' ');
    if (words.length > 1) {
        keywords.push(...words);
    }
    return keywords;
}

/** Regulations whose question, answer or topic contains any keyword, in dataset order. */
export function searchRegulations(
    query: string,
    regulations: readonly Regulation[],
    synonyms: readonly SynonymGroup[],
): Regulation[] {
    if (query.trim().length === 0) return [];

    const keywords = searchKeywords(query, synonyms).filter((keyword) => keyword.length > 0);
    const seen = new Set<string>();
    const results: Regulation[] = [];

    for (const regulation of regulations) {
        if (seen.has(regulation.topic)) continue;
        const haystacks = [
            normalizeText(regulation.question),
            normalizeText(regulation.answer),
            regulation.topic.replace(/_/g, ' '),
        ];
        if (keywords.some((keyword) => haystacks.some((text) => text.includes(keyword)))) {
            seen.add(regulation.topic);
            results.push({ ...regulation });
        }
    }
    return results;
}
