import { z } from 'zod';
import { JsonValue, JsonValueSchema, Track } from '../types';

export const MERGED_FIELDS = ['key_points', 'gold_nuggets', 'actions', 'quotes', 'outline'] as const;

export type MergedField = typeof MERGED_FIELDS[number];

export type ConsensusEntry = {
    /** Display text; also what de-duplication normalizes. */
    text: string;
    /** The first-seen item, unchanged. */
    value: JsonValue;
    provenance: Track[];
    confidence: number;
};

export type Consensus = {
    summary: Record<Track, JsonValue>;
    key_points: ConsensusEntry[];
    gold_nuggets: ConsensusEntry[];
    actions: ConsensusEntry[];
    quotes: ConsensusEntry[];
    outline: ConsensusEntry[];
};

export const AgreementSchema = z.object({
    agreement_score: z.preprocess(
        value => (typeof value === 'string' && value.trim() ? Number(value) : value),
        z.number().min(0).max(100),
    ),
    unique_to_a: z.array(JsonValueSchema).default([]),
    unique_to_b: z.array(JsonValueSchema).default([]),
    contradictions: z.array(JsonValueSchema).default([]),
    summary: z.string().default(''),
});

export type Agreement = z.infer<typeof AgreementSchema>;
