/**
 * Step descriptors from a resolved configuration, in canonical order.
 * Disabled steps are kept in the list so reports can show them.
 */

import { SOFT_STEP_KINDS, StepKind } from '../types';
import { PipelineConfiguration } from './config';
import { StepDescriptor, StepParamsByKind } from './types';

export const buildSteps = (config: PipelineConfiguration): StepDescriptor[] => {
    const reconcile = config.dual && config.analyze && config.consensus;

    const descriptor = <K extends StepKind>(kind: K, enabled: boolean, params: StepParamsByKind[K]) => ({
        kind,
        enabled,
        params,
        force: config.force.includes(kind),
        soft: SOFT_STEP_KINDS.includes(kind),
        retries: config.retries,
        timeoutMs: config.stepTimeoutMs,
    });

    return [
        descriptor('fetch', true, {
            show: config.show,
            rssUrl: config.rssUrl,
            youtubeUrl: config.youtubeUrl,
            date: config.date,
            titleContains: config.titleContains,
        }),
        descriptor('transcode', true, { format: config.audioFormat }),
        descriptor('transcribe', true, {
            model: config.asr.model,
            compute: config.asr.compute,
            provider: config.asr.provider,
            preset: config.asr.preset,
        }),
        descriptor('diarize', config.diarize, {}),
        descriptor('preprocess', config.preprocess, {
            restore: config.restore,
            restoreModel: config.restoreModel,
        }),
        descriptor('analyze', config.analyze, {
            model: config.analysis.model,
            temperature: config.analysis.temperature,
            type: config.analysis.type,
            maxCharsPerChunk: config.analysis.maxCharsPerChunk,
            concurrency: config.analysis.concurrency,
        }),
        descriptor('agreement', reconcile, { model: config.analysis.model }),
        descriptor('consensus', reconcile, { model: config.analysis.model }),
        descriptor('export', config.export, { formats: config.exportFormats }),
        descriptor('publish', config.publish, {
            destination: config.publishDestination,
            properties: config.publishProperties,
        }),
    ];
};
