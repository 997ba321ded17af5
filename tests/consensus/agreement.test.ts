import { describe, expect, test, vi } from 'vitest';
import { CompletionClient } from '../../src/analysis';
import * as Consensus from '../../src/consensus';
import { StepError } from '../../src/errors';

const failureOf = (fn: () => unknown) => {
    try {
        fn();
    } catch (error) {
        if (error instanceof StepError) {
            return error.failure;
        }
        throw error;
    }
    throw new Error('expected a StepError');
};

describe('agreement', () => {
    describe('buildAgreementRequest', () => {
        test('should compare the Markdown, or the structured fields when there is none', () => {
            const request = Consensus.buildAgreementRequest(
                { markdown: '# Precision brief', summary: 'ignored' },
                { summary: 'Recall brief', analysis_metadata: { model: 'gpt-4.1' } },
                'gpt-4.1',
            );

            expect(request).toEqual({
                system: Consensus.AGREEMENT_SYSTEM_PROMPT,
                prompt: 'Compare these two podcast analyses of the same episode. '
                    + 'Return JSON with keys: agreement_score (0-100), unique_to_a, unique_to_b, contradictions, summary.\n'
                    + '---A---\n# Precision brief\n---B---\n{"summary":"Recall brief"}',
                model: 'gpt-4.1',
                temperature: 0,
                json: true,
            });
        });

        test('should be deterministic', () => {
            const a = { markdown: 'A' };
            const b = { key_points: ['x'], summary: 'B' };

            expect(Consensus.buildAgreementRequest(a, b, 'm')).toEqual(Consensus.buildAgreementRequest(a, { summary: 'B', key_points: ['x'] }, 'm'));
        });
    });

    describe('parseAgreement', () => {
        test('should fill in missing lists and accept a numeric string score', () => {
            expect(Consensus.parseAgreement('```json\n{"agreement_score": "85", "unique_to_a": ["Hiring plans"]}\n```')).toEqual({
                agreement_score: 85,
                unique_to_a: ['Hiring plans'],
                unique_to_b: [],
                contradictions: [],
                summary: '',
            });
        });

        test('should reject a response that is not JSON', () => {
            expect(failureOf(() => Consensus.parseAgreement('The analyses mostly agree.'))).toEqual({
                kind: 'StepOutputInvalid',
                step: 'agreement',
                message: 'Agreement response is not JSON',
                diagnostic: 'The analyses mostly agree.',
            });
        });

        test('should reject a JSON value that is not an object', () => {
            expect(failureOf(() => Consensus.parseAgreement('[85]')).message).toBe('Agreement response is not a JSON object');
        });

        test('should reject a score out of range or missing', () => {
            expect(failureOf(() => Consensus.parseAgreement('{"agreement_score": 140}')).message)
                .toMatch(/^Agreement response failed validation: agreement_score: /);
            expect(failureOf(() => Consensus.parseAgreement('{"agreement_score": null}')).kind).toBe('StepOutputInvalid');
            expect(failureOf(() => Consensus.parseAgreement('{"summary": "close"}')).kind).toBe('StepOutputInvalid');
        });

        test('should cap the diagnostic', () => {
            const response = 'x'.repeat(500);

            expect(failureOf(() => Consensus.parseAgreement(response)).diagnostic).toHaveLength(200);
        });
    });

    test('requestAgreement should ask the completion client and parse its answer', async () => {
        const client: CompletionClient = {
            complete: vi.fn(async () => '{"agreement_score": 72, "summary": "Mostly aligned"}'),
        };

        const agreement = await Consensus.requestAgreement(client, { markdown: 'A' }, { markdown: 'B' }, 'gpt-4.1');

        expect(agreement.agreement_score).toBe(72);
        expect(agreement.summary).toBe('Mostly aligned');
        expect(client.complete).toHaveBeenCalledWith(Consensus.buildAgreementRequest({ markdown: 'A' }, { markdown: 'B' }, 'gpt-4.1'));
    });

    test('toDocument should record sources and the agreement score', () => {
        const document = Consensus.toDocument(
            { precision: { key_points: ['Same point'] }, recall: { key_points: ['same point'] } },
            { analyses: { precision: 'analysis-a+b__precision.json', recall: 'analysis-a+b__recall.json' } },
            { model: 'a' },
        );

        expect(document).toEqual({
            sources: { precision: 'analysis-a+b__precision.json', recall: 'analysis-a+b__recall.json', agreement: null },
            consensus: {
                summary: { precision: null, recall: null },
                key_points: [{ text: 'Same point', value: 'Same point', provenance: ['precision', 'recall'], confidence: 1 }],
                gold_nuggets: [],
                actions: [],
                quotes: [],
                outline: [],
            },
            consensus_metadata: { model: 'a', agreement_score: null },
        });
    });
});
