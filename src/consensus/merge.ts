import { JsonObject, JsonValue, TRACKS, Track, isJsonObject } from '../types';
import { Consensus, ConsensusEntry, MergedField } from './types';

const TEXT_FIELDS = ['quote', 'text', 'title', 'label'];

export const normalize = (text: string): string => text.trim().replace(/\s+/g, ' ').toLowerCase();

/** JSON with object keys sorted at every level. */
export const stableStringify = (value: JsonValue): string => {
    if (Array.isArray(value)) {
        return `[${value.map(stableStringify).join(',')}]`;
    }
    if (isJsonObject(value)) {
        const keys = Object.keys(value).sort();
        return `{${keys.map(key => `${JSON.stringify(key)}:${stableStringify(value[key])}`).join(',')}}`;
    }
    return JSON.stringify(value);
};

export const entryText = (item: JsonValue): string => {
    if (typeof item === 'string') {
        return item;
    }
    if (isJsonObject(item)) {
        for (const field of TEXT_FIELDS) {
            const candidate = item[field];
            if (typeof candidate === 'string' && candidate.trim()) {
                return candidate;
            }
        }
    }
    return stableStringify(item);
};

export const confidenceFor = (inBoth: boolean, agreementScore?: number): number => {
    const base = inBoth ? 1.0 : 0.7;
    if (agreementScore === undefined) {
        return base;
    }
    const scaled = base * (0.8 + 0.4 * agreementScore / 100);
    return Math.round(Math.min(1, Math.max(0, scaled)) * 100) / 100;
};

const itemsOf = (analysis: JsonObject, field: MergedField): JsonValue[] => {
    const value = analysis[field];
    return Array.isArray(value) ? value : [];
};

/**
 * Union one list field across tracks. Items are keyed by normalized text;
 * the first-seen item wins and later duplicates only add their track.
 */
export const mergeField = (
    lists: ReadonlyArray<readonly [Track, readonly JsonValue[]]>,
    agreementScore?: number,
): ConsensusEntry[] => {
    const entries = new Map<string, { text: string; value: JsonValue; provenance: Set<Track> }>();
    for (const [track, items] of lists) {
        for (const item of items) {
            const text = entryText(item);
            const key = normalize(text);
            if (!key) {
                continue;
            }
            const existing = entries.get(key);
            if (existing) {
                existing.provenance.add(track);
            } else {
                entries.set(key, { text: text.trim(), value: item, provenance: new Set([track]) });
            }
        }
    }

    return [...entries.values()].map(entry => {
        const provenance = TRACKS.filter(track => entry.provenance.has(track));
        return {
            text: entry.text,
            value: entry.value,
            provenance,
            confidence: confidenceFor(provenance.length === TRACKS.length, agreementScore),
        };
    });
};

export const buildConsensus = (
    analyses: Record<Track, JsonObject>,
    agreementScore?: number,
): Consensus => {
    const merged = (field: MergedField) => mergeField(
        TRACKS.map(track => [track, itemsOf(analyses[track], field)] as const),
        agreementScore,
    );
    return {
        summary: {
            precision: analyses.precision.summary ?? null,
            recall: analyses.recall.summary ?? null,
        },
        key_points: merged('key_points'),
        gold_nuggets: merged('gold_nuggets'),
        actions: merged('actions'),
        quotes: merged('quotes'),
        outline: merged('outline'),
    };
};
