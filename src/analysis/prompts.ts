/**
 * Analysis Prompt Templates
 *
 * One template per analysis type. Every type shares the same base persona
 * and output structure; a specialization line narrows what the map and
 * reduce calls pay attention to.
 */

import { AnalysisType } from './types';

export interface AnalysisTemplate {
    persona: string;
    specialization?: string;
    mapFocus?: string;
    reduceFocus?: string;
}

const BASE_PERSONA = [
    'You are an expert editorial assistant specializing in podcast content analysis and summarization.',
    'Never invent facts, names or details that are not in the transcript.',
    'Use clear, concise language and give quotes enough context to stand on their own.',
].join('\n');

export const TEMPLATES: Record<AnalysisType, AnalysisTemplate> = {
    'general': {
        persona: BASE_PERSONA,
    },
    'interview_guest_focused': {
        persona: BASE_PERSONA,
        specialization: 'Specialization: interview analysis centred on the guest\'s expertise, frameworks and tactical advice.',
        mapFocus: 'Prioritize: guest insights, concrete examples with outcomes, and the host questions that unlocked them.',
        reduceFocus: 'Emphasize: actionable frameworks and the most valuable question and answer exchanges.',
    },
    'panel_discussion': {
        persona: BASE_PERSONA,
        specialization: 'Specialization: panel discussion analysis capturing multiple perspectives and where they agree or differ.',
        mapFocus: 'Prioritize: distinct viewpoints, agreements and disagreements, and each participant\'s contribution.',
        reduceFocus: 'Emphasize: the range of perspectives and what the group concluded together.',
    },
    'solo_commentary': {
        persona: BASE_PERSONA,
        specialization: 'Specialization: solo commentary analysis focusing on the host\'s reasoning and perspective.',
        mapFocus: 'Prioritize: the host\'s arguments, opinions and personal experiences.',
        reduceFocus: 'Emphasize: the host\'s line of reasoning and the conclusions they draw.',
    },
};

const MAP_INSTRUCTIONS = [
    'Extract key information from this transcript CHUNK.',
    '',
    'Return:',
    '- 3-6 Key Points',
    '- 2-5 Gold Nuggets (surprising or novel insights)',
    '- 3-10 Notable Quotes',
    '- Any Action Items / Resources',
    '',
    'Return tight Markdown; do not include a global summary, this chunk only.',
].join('\n');

const REDUCE_INSTRUCTIONS = [
    'Synthesize these chunk-level notes into a single, cohesive Markdown brief.',
    'Deduplicate and organize cleanly, following the structure rules above.',
].join('\n');

export const JSON_SEPARATOR = '---JSON---';

const JSON_SCHEMA_HINT = [
    'After the Markdown, also prepare a concise JSON object with this structure:',
    '',
    '{',
    '  "summary": "string",',
    '  "key_points": ["string"],',
    '  "gold_nuggets": ["string"],',
    '  "quotes": [{"quote": "string", "time": "string", "speaker": "string"}],',
    '  "actions": ["string"],',
    '  "outline": [{"label": "string", "time": "string"}]',
    '}',
    '',
    `Return the JSON after the Markdown, separated by a line containing: ${JSON_SEPARATOR}`,
].join('\n');

const structureRules = (withTime: boolean, withSpeaker: boolean): string => [
    withTime
        ? '- When quoting, include [HH:MM:SS] timecodes from the nearest preceding segment.'
        : '- When quoting, omit timecodes because they are not available.',
    withSpeaker
        ? '- Preserve speaker labels like SPEAKER_00 or actual names if provided.'
        : '- Speaker labels are not available; write neutrally.',
    '',
    'Output Markdown with these sections, each only when it has content:',
    '# Episode Summary (4-8 sentences)',
    '## Key Points',
    '## Gold Nuggets',
    '## Notable Quotes',
    '## Action Items / Resources',
    '## Timestamps Outline',
].join('\n');

export const systemPrompt = (type: AnalysisType, withTime: boolean, withSpeaker: boolean): string => {
    const template = TEMPLATES[type];
    return [template.persona, template.specialization, '', structureRules(withTime, withSpeaker)]
        .filter((part): part is string => part !== undefined)
        .join('\n');
};

export const mapPrompt = (type: AnalysisType, chunk: string, index: number, total: number): string => {
    const focus = TEMPLATES[type].mapFocus;
    const instructions = focus ? `${MAP_INSTRUCTIONS}\n\n${focus}` : MAP_INSTRUCTIONS;
    return `${instructions}\n\nChunk ${index + 1}/${total}:\n\n${chunk}`;
};

export const reducePrompt = (type: AnalysisType, notes: readonly string[], wantJson: boolean): string => {
    const focus = TEMPLATES[type].reduceFocus;
    const instructions = focus ? `${REDUCE_INSTRUCTIONS}\n\n${focus}` : REDUCE_INSTRUCTIONS;
    const prompt = `${instructions}\n\nChunk notes:\n\n${notes.join('\n\n---\n\n')}`;
    return wantJson ? `${prompt}\n\n${JSON_SCHEMA_HINT}` : prompt;
};
