import { StepError } from '../errors';
import { CompletionClient, CompletionRequest } from '../analysis/types';
import { JsonObject, isJsonObject } from '../types';
import { stableStringify } from './merge';
import { Agreement, AgreementSchema } from './types';

export const AGREEMENT_SYSTEM_PROMPT = 'You compare podcast analyses and answer only with a JSON object.';

const sectionFor = (analysis: JsonObject): string => {
    const markdown = analysis.markdown;
    if (typeof markdown === 'string' && markdown.trim()) {
        return markdown;
    }
    const { analysis_metadata: _metadata, ...structured } = analysis;
    return stableStringify(structured);
};

/** The same two analyses always give the same request. */
export const buildAgreementRequest = (a: JsonObject, b: JsonObject, model: string): CompletionRequest => ({
    system: AGREEMENT_SYSTEM_PROMPT,
    prompt: 'Compare these two podcast analyses of the same episode. '
        + 'Return JSON with keys: agreement_score (0-100), unique_to_a, unique_to_b, contradictions, summary.\n'
        + `---A---\n${sectionFor(a)}\n---B---\n${sectionFor(b)}`,
    model,
    temperature: 0,
    json: true,
});

const invalid = (message: string, diagnostic: string): StepError => new StepError({
    kind: 'StepOutputInvalid',
    step: 'agreement',
    message,
    diagnostic: diagnostic.slice(0, 200),
});

/** @throws StepError with kind StepOutputInvalid when the response is not a usable agreement document. */
export const parseAgreement = (response: string): Agreement => {
    const body = response.trim().replace(/^```(?:json)?/, '').replace(/```$/, '').trim();
    let candidate: unknown;
    try {
        candidate = JSON.parse(body);
    } catch {
        throw invalid('Agreement response is not JSON', response);
    }
    if (!isJsonObject(candidate)) {
        throw invalid('Agreement response is not a JSON object', response);
    }
    const parsed = AgreementSchema.safeParse(candidate);
    if (!parsed.success) {
        throw invalid(
            `Agreement response failed validation: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
            response,
        );
    }
    return parsed.data;
};

export const requestAgreement = async (
    client: CompletionClient,
    a: JsonObject,
    b: JsonObject,
    model: string,
): Promise<Agreement> => parseAgreement(await client.complete(buildAgreementRequest(a, b, model)));
