/**
 * Pipeline Orchestrator
 *
 * Turns an ordered list of step descriptors into a run against one working
 * directory. State is never kept between runs: every run starts from what the
 * detector finds on disk, skips steps whose artifact is already there, and
 * executes the rest with the step's retry budget.
 *
 * In dual-track mode the shared prefix (fetch, transcode) runs once, the
 * track steps run for both tracks concurrently, and the agreement, consensus,
 * export and publish steps follow once both tracks have finished.
 */

import * as Analysis from '../analysis';
import { ArtifactDescriptor, ArtifactKey, Detector, Lineage, Store } from '../artifacts';
import * as Consensus from '../consensus';
import { CommandBuilder, StepInvocation } from '../contract';
import { DetectorIOError, StepError, StepFailure, errorMessage } from '../errors';
import * as Executor from '../executor';
import * as Graph from '../graph';
import * as Logging from '../logging';
import { JsonObject, JsonValue, JsonValueSchema, StepKind, TRACKS, TRACK_STEP_KINDS, Track, isJsonObject } from '../types';
import { Semaphore } from '../util/concurrency';
import * as Storage from '../util/storage';
import * as Plan from './plan';
import {
    RunFailure,
    RunReport,
    RunRequest,
    StepCommands,
    StepDescriptor,
    StepRecord,
    StepStatus,
} from './types';

export interface OrchestratorConfig {
    executor: Executor.Instance;
    /** Used by the analyze and agreement steps. */
    completion: Analysis.CompletionClient;
    commands: StepCommands;
    detector?: Detector.Instance;
    lineage?: Lineage.Instance;
    /** Called with a copy of the record whenever a step changes state. */
    onStepChange?: (record: StepRecord) => void;
}

export interface OrchestratorInstance {
    run(request: RunRequest): Promise<RunReport>;
}

type StepOutcome =
    | { ok: true; artifact: ArtifactDescriptor; parent: string | null }
    | { ok: false; failure: StepFailure };

interface TrackState {
    /** Track whose records and artifacts this sequence produces. */
    track?: Track;
    /** Track whose transcripts are read; defaults to `track`. */
    source?: Track;
    /** Most processed transcript variant read so far. */
    current?: Graph.Variant;
}

const sourceOf = (state: TrackState): Track | undefined => state.source ?? state.track;

const SHARED_PREFIX: readonly StepKind[] = ['fetch', 'transcode'];

const lineageParameters = (step: StepDescriptor, track?: Track): Record<string, string | number | boolean | null> => {
    const parameters: Record<string, string | number | boolean | null> = {};
    for (const [key, value] of Object.entries(step.params)) {
        if (value === undefined) {
            continue;
        }
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            parameters[key] = value;
        } else if (Array.isArray(value)) {
            parameters[key] = value.join(',');
        } else {
            parameters[key] = JSON.stringify(value);
        }
    }
    if (track) {
        parameters.track = track;
    }
    return parameters;
};

const describeStep = (kind: StepKind, track?: Track): string => track ? `${kind} [${track}]` : kind;

export const create = (config: OrchestratorConfig): OrchestratorInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const detector = config.detector ?? Detector.create();
    const lineage = config.lineage ?? Lineage.create();

    const run = async (request: RunRequest): Promise<RunReport> => {
        const startTime = Date.now();
        const { workingDirectory, dual } = request;

        Plan.validateSteps(request.steps, dual);
        const ids = Plan.identify(request.steps);
        Plan.checkOutputNames(request.steps, ids, dual);

        // One limit on completions in flight, whichever track asks
        const analyzeStep = Plan.findStep(request.steps, 'analyze');
        const completion = analyzeStep
            ? Analysis.limitCompletions(config.completion, new Semaphore(analyzeStep.params.concurrency))
            : config.completion;

        try {
            await storage.createDirectory(workingDirectory);
        } catch (error) {
            throw new DetectorIOError(workingDirectory, { cause: error });
        }
        const detection = await detector.detect(workingDirectory);
        Plan.checkFeasibility(request.steps, detection, ids, dual);

        const enabled = request.steps.filter(step => step.enabled);
        const records: StepRecord[] = [];
        const recordFor = new Map<string, StepRecord>();
        const recordKey = (kind: StepKind, track?: Track) => `${kind}:${track ?? ''}`;
        for (const step of enabled) {
            const tracks: ReadonlyArray<Track | undefined> = dual && TRACK_STEP_KINDS.includes(step.kind) ? TRACKS : [undefined];
            for (const track of tracks) {
                const record: StepRecord = { step: step.kind, status: 'Pending', attempts: 0, ...(track && { track }) };
                records.push(record);
                recordFor.set(recordKey(step.kind, track), record);
            }
        }

        const update = (record: StepRecord, status: StepStatus, changes: Partial<StepRecord> = {}) => {
            Object.assign(record, changes, { status });
            config.onStepChange?.({ ...record });
        };

        // Everything known to exist, starting with what the detector found
        const known: ArtifactDescriptor[] = [...detection.artifacts];
        const find = (key: ArtifactKey) => known.find(artifact => Store.sameKey(artifact, key));
        const remember = (artifact: ArtifactDescriptor) => {
            const index = known.findIndex(existing => Store.sameKey(existing, artifact));
            if (index >= 0) {
                known[index] = artifact;
            } else {
                known.push(artifact);
            }
        };
        const describeKey = (key: ArtifactKey): ArtifactDescriptor => ({
            ...key,
            fileName: Store.fileNameFor(key),
            path: Store.locate(workingDirectory, key),
        });

        const availableVariants = (state: TrackState): Graph.Variant[] =>
            Graph.VARIANTS.filter(variant => find(Plan.transcriptKey(variant, ids, sourceOf(state))) !== undefined);

        const loadDocument = async (artifact: ArtifactDescriptor): Promise<JsonValue> => {
            const parsed = JsonValueSchema.safeParse(await detector.load(artifact));
            if (!parsed.success) {
                throw new Error(`${artifact.fileName} is not a JSON document`);
            }
            return parsed.data;
        };

        const loadObject = async (artifact: ArtifactDescriptor): Promise<JsonObject> => {
            const document = await loadDocument(artifact);
            if (!isJsonObject(document)) {
                throw new Error(`${artifact.fileName} is not a JSON object`);
            }
            return document;
        };

        const requireArtifact = (key: ArtifactKey, kind: StepKind): ArtifactDescriptor => {
            const artifact = find(key);
            if (!artifact) {
                throw new Error(`${kind} needs ${Store.fileNameFor(key)}, which does not exist`);
            }
            return artifact;
        };

        const currentTranscript = (state: TrackState, kind: StepKind): ArtifactDescriptor => {
            const variant = state.current ?? Graph.mostProcessed(availableVariants(state));
            if (variant === undefined) {
                throw new Error(`${kind} needs a transcript, but none exists`);
            }
            return requireArtifact(Plan.transcriptKey(variant, ids, sourceOf(state)), kind);
        };

        const external = async (
            kind: StepKind,
            invocation: Omit<StepInvocation, 'step' | 'persistTo' | 'cwd'>,
            output: ArtifactDescriptor,
            parent: string | null,
        ): Promise<StepOutcome> => {
            const result = await config.executor.execute({
                ...invocation,
                step: kind,
                persistTo: output.path,
                cwd: workingDirectory,
            });
            return result.ok ? { ok: true, artifact: output, parent } : { ok: false, failure: result.failure };
        };

        const writeDocument = async (output: ArtifactDescriptor, document: JsonObject, parent: string | null): Promise<StepOutcome> => {
            await storage.writeFileAtomic(output.path, JSON.stringify(document, null, 2));
            return { ok: true, artifact: output, parent };
        };

        const episodeContext = async (): Promise<JsonObject> => {
            const episode = find(Plan.outputKey('fetch', ids));
            return episode ? loadObject(episode) : {};
        };

        const perform = async (step: StepDescriptor, state: TrackState, output: ArtifactDescriptor): Promise<StepOutcome> => {
            const timeoutMs = step.timeoutMs;
            switch (step.kind) {
                case 'fetch': {
                    const options = new CommandBuilder()
                        .addOption('--show', step.params.show)
                        .addOption('--rss-url', step.params.rssUrl)
                        .addOption('--youtube-url', step.params.youtubeUrl)
                        .addOption('--date', step.params.date)
                        .addOption('--title-contains', step.params.titleContains)
                        .addOption('--outdir', workingDirectory)
                        .build();
                    return external('fetch', { command: config.commands.fetch, options, timeoutMs }, output, null);
                }
                case 'transcode': {
                    const episode = requireArtifact(Plan.outputKey('fetch', ids), 'transcode');
                    const options = new CommandBuilder()
                        .addOption('--format', step.params.format)
                        .addOption('--outdir', workingDirectory)
                        .build();
                    return external('transcode', { command: config.commands.transcode, options, input: await loadDocument(episode), timeoutMs }, output, episode.fileName);
                }
                case 'transcribe': {
                    const audio = requireArtifact(Plan.outputKey('transcode', ids), 'transcribe');
                    const options = new CommandBuilder()
                        .addOption('--model', step.params.model)
                        .addOption('--compute', step.params.compute)
                        .addOption('--asr-provider', step.params.provider)
                        .addOption('--preset', state.track ?? step.params.preset)
                        .build();
                    return external('transcribe', { command: config.commands.transcribe, options, input: await loadDocument(audio), timeoutMs }, output, audio.fileName);
                }
                case 'diarize': {
                    const input = Graph.selectInput('diarize', availableVariants(state));
                    const transcript = requireArtifact(Plan.transcriptKey(input ?? 'base', ids, sourceOf(state)), 'diarize');
                    const audio = find(Plan.outputKey('transcode', ids));
                    const audioMeta = audio ? await loadObject(audio) : {};
                    const options = new CommandBuilder()
                        .addOption('--audio', typeof audioMeta.audio_path === 'string' ? audioMeta.audio_path : undefined)
                        .build();
                    return external('diarize', { command: config.commands.diarize, options, input: await loadDocument(transcript), timeoutMs }, output, transcript.fileName);
                }
                case 'preprocess': {
                    const input = Graph.selectInput('preprocess', availableVariants(state));
                    if (input === undefined) {
                        throw new Error('preprocess needs a transcript, but none exists');
                    }
                    const transcript = requireArtifact(Plan.transcriptKey(input, ids, sourceOf(state)), 'preprocess');
                    const options = new CommandBuilder()
                        .addFlag('--merge')
                        .addFlag('--normalize')
                        .addFlag('--restore', step.params.restore)
                        .addOption('--restore-model', step.params.restore ? step.params.restoreModel : undefined)
                        .build();
                    return external('preprocess', { command: config.commands.preprocess, options, input: await loadDocument(transcript), timeoutMs }, output, transcript.fileName);
                }
                case 'analyze': {
                    const transcript = currentTranscript(state, 'analyze');
                    const document = await loadObject(transcript);
                    const episode = await episodeContext();
                    const analysis = Analysis.create(completion, step.params);
                    const result = await analysis.analyze({
                        ...(typeof episode.show === 'string' && { show: episode.show }),
                        ...(typeof episode.episode_title === 'string' && { episode_title: episode.episode_title }),
                        ...(typeof episode.episode_published === 'string' && { episode_published: episode.episode_published }),
                        ...document,
                    });
                    return writeDocument(output, Analysis.toDocument(result, {
                        model: step.params.model,
                        asr_model: ids.asr,
                        analysis_type: step.params.type,
                        transcript: transcript.fileName,
                        track: state.track ?? null,
                    }), transcript.fileName);
                }
                case 'agreement': {
                    const [precision, recall] = TRACKS.map(track => requireArtifact(Plan.outputKey('analyze', ids, track), 'agreement'));
                    const agreement = await Consensus.requestAgreement(
                        completion,
                        await loadObject(precision),
                        await loadObject(recall),
                        step.params.model,
                    );
                    return writeDocument(output, {
                        ...agreement,
                        agreement_metadata: {
                            model: step.params.model,
                            asr_model: ids.asr,
                            a: precision.fileName,
                            b: recall.fileName,
                        },
                    }, precision.fileName);
                }
                case 'consensus': {
                    const [precision, recall] = TRACKS.map(track => requireArtifact(Plan.outputKey('analyze', ids, track), 'consensus'));
                    const agreementFile = find(Plan.outputKey('agreement', ids));
                    let agreement: Consensus.Agreement | undefined;
                    if (agreementFile) {
                        const parsed = Consensus.AgreementSchema.safeParse(await loadObject(agreementFile));
                        if (parsed.success) {
                            agreement = parsed.data;
                        } else {
                            logger.warn('Ignoring malformed agreement %s', agreementFile.fileName);
                        }
                    }
                    const document = Consensus.toDocument(
                        { precision: await loadObject(precision), recall: await loadObject(recall) },
                        {
                            analyses: { precision: precision.fileName, recall: recall.fileName },
                            ...(agreementFile && { agreement: agreementFile.fileName }),
                        },
                        { created_at: new Date().toISOString(), model: step.params.model, asr_model: ids.asr },
                        agreement,
                    );
                    return writeDocument(output, document, agreementFile?.fileName ?? precision.fileName);
                }
                case 'export': {
                    const transcript = currentTranscript(state, 'export');
                    const analysis = dual
                        ? find(Plan.outputKey('consensus', ids))
                        : find(Plan.outputKey('analyze', ids));
                    const options = new CommandBuilder()
                        .addOption('--formats', step.params.formats.join(','))
                        .addOption('--output-dir', workingDirectory)
                        .build();
                    const input = {
                        transcript: await loadDocument(transcript),
                        analysis: analysis ? await loadDocument(analysis) : null,
                    };
                    return external('export', { command: config.commands.export, options, input, timeoutMs }, output, transcript.fileName);
                }
                case 'publish': {
                    const analysis = dual
                        ? requireArtifact(Plan.outputKey('consensus', ids), 'publish')
                        : requireArtifact(Plan.outputKey('analyze', ids), 'publish');
                    const options = new CommandBuilder()
                        .addOption('--destination', step.params.destination)
                        .addOptions(Object.fromEntries(
                            Object.entries(step.params.properties).map(([name, value]) => [`${name}Prop`, value]),
                        ))
                        .build();
                    const input = {
                        analysis: await loadDocument(analysis),
                        episode: await episodeContext(),
                    };
                    return external('publish', { command: config.commands.publish, options, input, timeoutMs }, output, analysis.fileName);
                }
            }
        };

        const attempt = async (step: StepDescriptor, state: TrackState, output: ArtifactDescriptor): Promise<StepOutcome> => {
            try {
                return await perform(step, state, output);
            } catch (error) {
                if (error instanceof StepError) {
                    return { ok: false, failure: error.failure };
                }
                return {
                    ok: false,
                    failure: { kind: 'StepFailed', step: step.kind, message: errorMessage(error), diagnostic: '' },
                };
            }
        };

        const advance = (step: StepDescriptor, state: TrackState, from?: Graph.Variant) => {
            if (step.kind === 'diarize' || step.kind === 'preprocess') {
                state.current = from !== undefined
                    ? Graph.next(from, step.kind)
                    : Graph.mostProcessed(availableVariants(state));
            } else if (step.kind === 'transcribe') {
                state.current = Graph.mostProcessed(availableVariants(state));
            }
        };

        /** The input file a step would read if it ran now. */
        const expectedParent = (step: StepDescriptor, state: TrackState): string | undefined => {
            let variant: Graph.Variant | undefined;
            if (step.kind === 'diarize' || step.kind === 'preprocess') {
                variant = Graph.selectInput(step.kind, availableVariants(state));
            } else if (step.kind === 'analyze') {
                variant = state.current ?? Graph.mostProcessed(availableVariants(state));
            }
            return variant === undefined ? undefined : Store.fileNameFor(Plan.transcriptKey(variant, ids, sourceOf(state)));
        };

        // Skipping still goes by file name; a changed input is only reported
        const flagStaleParent = async (step: StepDescriptor, state: TrackState, output: ArtifactDescriptor): Promise<void> => {
            const expected = expectedParent(step, state);
            if (expected === undefined) {
                return;
            }
            const previous = await lineage.read(workingDirectory, output.fileName);
            if (previous?.parent && previous.parent !== expected) {
                logger.warn('%s was made from %s, not %s; rerun with --force %s to rebuild it',
                    output.fileName, previous.parent, expected, step.kind);
            }
        };

        const warnings: string[] = [];

        /** Runs one step to a terminal state. Returns the failure when it aborts the track. */
        const runStep = async (step: StepDescriptor, state: TrackState): Promise<RunFailure | undefined> => {
            const record = recordFor.get(recordKey(step.kind, state.track));
            if (!record) {
                return undefined;
            }
            const label = describeStep(step.kind, state.track);
            const key = Plan.outputKey(step.kind, ids, state.track);
            const output = describeKey(key);

            if (!step.force && find(key)) {
                logger.info('Skipping %s: %s already exists', label, output.fileName);
                await flagStaleParent(step, state, output);
                update(record, 'Skipped', { artifact: output.fileName });
                advance(step, state);
                return undefined;
            }

            const input = step.kind === 'diarize' || step.kind === 'preprocess'
                ? Graph.selectInput(step.kind, availableVariants(state))
                : undefined;

            const startTime = Date.now();
            let outcome: StepOutcome | undefined;
            for (let attempts = 1; attempts <= step.retries + 1; attempts++) {
                update(record, 'Running', { attempts });
                logger.info('Running %s%s', label, attempts > 1 ? ` (attempt ${attempts} of ${step.retries + 1})` : '');
                outcome = await attempt(step, state, output);
                if (outcome.ok) {
                    break;
                }
                logger.warn('%s failed: %s', label, outcome.failure.message);
            }
            const durationMs = Date.now() - startTime;

            if (outcome && outcome.ok) {
                remember(outcome.artifact);
                try {
                    await lineage.record(workingDirectory, {
                        artifact: outcome.artifact.fileName,
                        kind: outcome.artifact.kind,
                        operation: step.kind,
                        parent: outcome.parent,
                        parameters: lineageParameters(step, state.track),
                    });
                } catch (error) {
                    logger.warn('Could not record lineage for %s: %s', outcome.artifact.fileName, errorMessage(error));
                }
                advance(step, state, input);
                logger.info('Completed %s in %.1fs -> %s', label, durationMs / 1000, outcome.artifact.fileName);
                update(record, 'Completed', { artifact: outcome.artifact.fileName, durationMs });
                return undefined;
            }

            const failure: StepFailure = outcome && !outcome.ok
                ? outcome.failure
                : { kind: 'StepFailed', step: step.kind, message: `${label} did not run`, diagnostic: '' };
            update(record, 'Failed', { failure, durationMs });

            if (step.soft) {
                warnings.push(`${label} failed: ${failure.message}`);
                return undefined;
            }
            logger.error('%s failed (%s): %s', label, failure.kind, failure.diagnostic || failure.message);
            return {
                step: step.kind,
                ...(state.track && { track: state.track }),
                kind: failure.kind,
                message: failure.message,
                diagnostic: failure.diagnostic,
            };
        };

        const runSequence = async (steps: readonly StepDescriptor[], state: TrackState): Promise<RunFailure | undefined> => {
            for (const step of steps) {
                const failure = await runStep(step, state);
                if (failure) {
                    return failure;
                }
            }
            return undefined;
        };

        const singleState: TrackState = { current: Graph.mostProcessed(availableVariants({})) };
        let failure: RunFailure | undefined;

        if (!dual) {
            failure = await runSequence(enabled, singleState);
        } else {
            const prefix = enabled.filter(step => SHARED_PREFIX.includes(step.kind));
            const trackSteps = enabled.filter(step => TRACK_STEP_KINDS.includes(step.kind));
            const suffix = enabled.filter(step => !SHARED_PREFIX.includes(step.kind) && !TRACK_STEP_KINDS.includes(step.kind));

            failure = await runSequence(prefix, singleState);
            if (!failure) {
                const states: TrackState[] = TRACKS.map(track => ({
                    track,
                    current: Graph.mostProcessed(availableVariants({ track })),
                }));
                const settled = await Promise.allSettled(states.map(state => runSequence(trackSteps, state)));
                for (const [index, result] of settled.entries()) {
                    if (result.status === 'rejected') {
                        logger.error('Track %s stopped unexpectedly: %s', TRACKS[index], errorMessage(result.reason));
                    }
                    if (!failure) {
                        failure = result.status === 'fulfilled'
                            ? result.value
                            : { step: trackSteps[0]?.kind ?? 'transcribe', track: TRACKS[index], kind: 'StepFailed', message: errorMessage(result.reason), diagnostic: '' };
                    }
                }
            }
            if (!failure) {
                // Export reads the precision transcript alongside the consensus
                failure = await runSequence(suffix, { source: 'precision' });
            }
        }

        let artifacts: string[];
        try {
            artifacts = (await detector.detect(workingDirectory)).artifacts.map(artifact => artifact.fileName);
        } catch (error) {
            logger.warn('Could not list %s after the run: %s', workingDirectory, errorMessage(error));
            artifacts = known.map(artifact => artifact.fileName).sort();
        }

        const status = failure ? 'Aborted' : warnings.length > 0 ? 'PartiallyCompleted' : 'Completed';
        const durationMs = Date.now() - startTime;
        logger.info('Run finished: %s in %.1fs (%d artifact(s))', status, durationMs / 1000, artifacts.length);

        return {
            status,
            workingDirectory,
            steps: records,
            warnings,
            ...(failure && { failure }),
            artifacts,
            durationMs,
        };
    };

    return { run };
};
