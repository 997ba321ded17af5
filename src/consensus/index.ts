/**
 * Consensus Engine
 *
 * Reconciles the precision and recall analyses of one episode: an agreement
 * report from the completion service, then a deterministic merge of the list
 * fields with provenance and confidence per entry.
 */

import { JsonObject, Track } from '../types';
import { buildConsensus } from './merge';
import { Agreement } from './types';

export interface ConsensusSources {
    analyses: Record<Track, string>;
    agreement?: string;
}

/** The consensus artifact: merged sections plus where they came from. */
export const toDocument = (
    analyses: Record<Track, JsonObject>,
    sources: ConsensusSources,
    metadata: JsonObject,
    agreement?: Agreement,
): JsonObject => ({
    sources: {
        precision: sources.analyses.precision,
        recall: sources.analyses.recall,
        agreement: sources.agreement ?? null,
    },
    consensus: buildConsensus(analyses, agreement?.agreement_score),
    consensus_metadata: {
        ...metadata,
        agreement_score: agreement?.agreement_score ?? null,
    },
});

export { buildConsensus, confidenceFor, entryText, mergeField, normalize, stableStringify } from './merge';
export { AGREEMENT_SYSTEM_PROMPT, buildAgreementRequest, parseAgreement, requestAgreement } from './agreement';
export * from './types';
