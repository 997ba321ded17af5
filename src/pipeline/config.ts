/**
 * Pipeline Configuration
 *
 * Resolution order, lowest precedence first:
 *
 *   PODLINE_DEFAULTS -> environment -> configuration file -> preset (fidelity, workflow) -> command line
 *
 * Each layer is a partial object; nested sections (`asr`, `analysis`,
 * `commands`, `publishProperties`) merge key by key instead of replacing the
 * lower layer wholesale. The merged object is validated once.
 */

import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ANALYSIS_TYPES } from '../analysis/types';
import { DEFAULT_STEP_COMMANDS, PODLINE_DEFAULTS } from '../constants';
import { ConfigurationError, errorMessage } from '../errors';
import * as Logging from '../logging';
import { STEP_KINDS, isJsonObject } from '../types';
import * as Storage from '../util/storage';

const CommandSchema = z.array(z.string().min(1)).min(1);

export const PipelineConfigurationSchema = z.object({
    verbose: z.boolean(),
    debug: z.boolean(),

    show: z.string().optional(),
    rssUrl: z.string().url().optional(),
    youtubeUrl: z.string().url().optional(),
    date: z.string().optional(),
    titleContains: z.string().optional(),

    outputDirectory: z.string().min(1),
    workdir: z.string().optional(),
    audioFormat: z.string().min(1),

    asr: z.object({
        provider: z.string().min(1),
        model: z.string().min(1),
        compute: z.string().min(1),
        preset: z.enum(['precision', 'recall', 'balanced']).optional(),
    }),

    diarize: z.boolean(),
    preprocess: z.boolean(),
    restore: z.boolean(),
    restoreModel: z.string().optional(),
    analyze: z.boolean(),
    analysis: z.object({
        provider: z.enum(['command', 'openai']),
        model: z.string().min(1),
        temperature: z.number().min(0).max(2),
        type: z.enum(ANALYSIS_TYPES),
        maxCharsPerChunk: z.number().int().positive(),
        concurrency: z.number().int().positive(),
    }),

    dual: z.boolean(),
    consensus: z.boolean(),

    export: z.boolean(),
    exportFormats: z.array(z.string().min(1)).min(1),
    publish: z.boolean(),
    publishDestination: z.string().min(1),
    publishProperties: z.record(z.string()),

    force: z.array(z.enum(STEP_KINDS)),
    retries: z.number().int().min(0),
    stepTimeoutMs: z.number().int().positive(),

    commands: z.object({
        fetch: CommandSchema,
        transcode: CommandSchema,
        transcribe: CommandSchema,
        diarize: CommandSchema,
        preprocess: CommandSchema,
        complete: CommandSchema,
        export: CommandSchema,
        publish: CommandSchema,
    }),
});

export type PipelineConfiguration = z.infer<typeof PipelineConfigurationSchema>;

/** One configuration layer; nested sections may be given partially. */
export type ConfigLayer = Partial<Omit<PipelineConfiguration, 'asr' | 'analysis' | 'commands'>> & {
    asr?: Partial<PipelineConfiguration['asr']>;
    analysis?: Partial<PipelineConfiguration['analysis']>;
    commands?: Partial<PipelineConfiguration['commands']>;
};

export const FIDELITY_LEVELS = [1, 2, 3, 4, 5] as const;
export type Fidelity = typeof FIDELITY_LEVELS[number];

export const WORKFLOWS = ['quick', 'analyze', 'publish'] as const;
export type Workflow = typeof WORKFLOWS[number];

export const isFidelity = (value: number): value is Fidelity =>
    (FIDELITY_LEVELS as readonly number[]).includes(value);

export const isWorkflow = (value: string): value is Workflow =>
    (WORKFLOWS as readonly string[]).includes(value);

/**
 * 1: analysis only
 * 2: recall transcription, preprocess with restore, analysis
 * 3: precision transcription, same
 * 4: balanced transcription, same
 * 5: both tracks, preprocess with restore, analysis
 */
export const fidelityPreset = (level: Fidelity): ConfigLayer => {
    switch (level) {
        case 1:
            return { diarize: false, preprocess: false, dual: false, analyze: true };
        case 2:
            return { asr: { preset: 'recall' }, preprocess: true, restore: true, analyze: true, dual: false };
        case 3:
            return { asr: { preset: 'precision' }, preprocess: true, restore: true, analyze: true, dual: false };
        case 4:
            return { asr: { preset: 'balanced' }, preprocess: true, restore: true, analyze: true, dual: false };
        case 5:
            return { dual: true, preprocess: true, restore: true, analyze: true };
    }
};

export const workflowPreset = (workflow: Workflow): ConfigLayer => {
    switch (workflow) {
        case 'quick':
            return { diarize: false, analyze: false, export: false, publish: false };
        case 'analyze':
            return { diarize: false, analyze: true, export: true };
        case 'publish':
            return { diarize: false, analyze: true, export: true, publish: true };
    }
};

export const DEFAULT_LAYER: ConfigLayer = {
    ...PODLINE_DEFAULTS,
    asr: { ...PODLINE_DEFAULTS.asr },
    analysis: {
        ...PODLINE_DEFAULTS.analysis,
        provider: 'command',
        type: 'general',
    },
    exportFormats: [...PODLINE_DEFAULTS.exportFormats],
    publishProperties: {},
    force: [],
    commands: {
        fetch: [...DEFAULT_STEP_COMMANDS.fetch],
        transcode: [...DEFAULT_STEP_COMMANDS.transcode],
        transcribe: [...DEFAULT_STEP_COMMANDS.transcribe],
        diarize: [...DEFAULT_STEP_COMMANDS.diarize],
        preprocess: [...DEFAULT_STEP_COMMANDS.preprocess],
        complete: [...DEFAULT_STEP_COMMANDS.complete],
        export: [...DEFAULT_STEP_COMMANDS.export],
        publish: [...DEFAULT_STEP_COMMANDS.publish],
    },
};

const mergeTwo = (lower: ConfigLayer, upper: ConfigLayer): ConfigLayer => ({
    ...lower,
    ...upper,
    asr: { ...lower.asr, ...upper.asr },
    analysis: { ...lower.analysis, ...upper.analysis },
    commands: { ...lower.commands, ...upper.commands },
    publishProperties: { ...lower.publishProperties, ...upper.publishProperties },
});

/** Later layers win. Layers carry only the keys they set. */
export const mergeLayers = (...layers: ConfigLayer[]): ConfigLayer => layers.reduce(mergeTwo, {});

export const validateConfiguration = (candidate: unknown): PipelineConfiguration => {
    const parsed = PipelineConfigurationSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration: ${issues}`);
    }
    return parsed.data;
};

export interface ResolveOptions {
    env?: ConfigLayer;
    file?: ConfigLayer;
    fidelity?: Fidelity;
    workflow?: Workflow;
    cli?: ConfigLayer;
}

export const resolveConfiguration = (options: ResolveOptions = {}): PipelineConfiguration => {
    const presets: ConfigLayer[] = [
        ...(options.fidelity !== undefined ? [fidelityPreset(options.fidelity)] : []),
        ...(options.workflow !== undefined ? [workflowPreset(options.workflow)] : []),
    ];
    return validateConfiguration(mergeLayers(DEFAULT_LAYER, options.env ?? {}, options.file ?? {}, ...presets, options.cli ?? {}));
};

const FileLayerSchema = PipelineConfigurationSchema.partial().extend({
    asr: PipelineConfigurationSchema.shape.asr.partial().strict().optional(),
    analysis: PipelineConfigurationSchema.shape.analysis.partial().strict().optional(),
    commands: PipelineConfigurationSchema.shape.commands.partial().strict().optional(),
}).strict();

/**
 * Read a YAML configuration file. A missing file is an empty layer; an
 * unparsable one is a `ConfigurationError`.
 */
export const readConfigFile = async (filePath: string): Promise<ConfigLayer> => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    if (!await storage.exists(filePath)) {
        logger.debug('No configuration file at %s', filePath);
        return {};
    }

    let document: unknown;
    try {
        document = yaml.load(await storage.readFile(filePath));
    } catch (error) {
        throw new ConfigurationError(`Cannot parse configuration file ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
    if (document === undefined || document === null) {
        return {};
    }
    if (!isJsonObject(document)) {
        throw new ConfigurationError(`Configuration file ${filePath} must contain a mapping`);
    }

    const parsed = FileLayerSchema.safeParse(document);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ConfigurationError(`Invalid configuration file ${filePath}: ${issues}`);
    }
    logger.debug('Loaded configuration from %s', filePath);
    return parsed.data;
};
