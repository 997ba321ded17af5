import { StepFailure } from '../errors';
import { JsonValue } from '../types';

export interface StepSuccess {
    ok: true;
    /** Parsed output document; always a JSON object or array. */
    output: JsonValue;
    /** Stdout exactly as the step emitted it. */
    raw: string;
    durationMs: number;
}

export interface StepFailureResult {
    ok: false;
    failure: StepFailure;
    durationMs: number;
}

export type StepResult = StepSuccess | StepFailureResult;
