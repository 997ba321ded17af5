import { Command } from 'commander';
import dayjs from 'dayjs';
import * as path from 'node:path';
import { z } from 'zod';
import { ANALYSIS_TYPES } from './analysis/types';
import {
    DEFAULT_CONFIG_FILE,
    DEFAULT_EPISODE_DATE_FORMAT,
    PROGRAM_NAME,
    VERSION,
} from './constants';
import { ConfigurationError } from './errors';
import { getLogger } from './logging';
import {
    ConfigLayer,
    Fidelity,
    PipelineConfiguration,
    Workflow,
    isFidelity,
    isWorkflow,
    readConfigFile,
    resolveConfiguration,
} from './pipeline';
import { STEP_KINDS, isStepKind } from './types';

export interface RunArgs {
    config?: string;
    show?: string;
    rssUrl?: string;
    youtubeUrl?: string;
    date?: string;
    titleContains?: string;
    workdir?: string;
    outputDirectory?: string;
    asrModel?: string;
    asrCompute?: string;
    asrProvider?: string;
    asrPreset?: string;
    diarize?: boolean;
    preprocess?: boolean;
    restore?: boolean;
    restoreModel?: string;
    analyze?: boolean;
    analysisModel?: string;
    analysisProvider?: string;
    analysisType?: string;
    temperature?: string;
    chunkChars?: string;
    concurrency?: string;
    dual?: boolean;
    consensus?: boolean;
    export?: boolean;
    formats?: string;
    publish?: boolean;
    destination?: string;
    force?: string[];
    retries?: string;
    timeout?: string;
    fidelity?: string;
    workflow?: string;
    verbose?: boolean;
    debug?: boolean;
}

export const SecureConfigSchema = z.object({
    openaiApiKey: z.string().optional(),
    openaiBaseUrl: z.string().optional(),
});

export type SecureConfig = z.infer<typeof SecureConfigSchema>;

export interface RunConfiguration {
    config: PipelineConfiguration;
    secureConfig: SecureConfig;
    workingDirectory: string;
}

export interface Handlers {
    run(args: RunArgs): Promise<void>;
    status(root: string): Promise<void>;
}

const parseNumber = (value: string, option: string, integer: boolean): number => {
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed) || (integer && !Number.isInteger(parsed))) {
        throw new ConfigurationError(`Invalid value for ${option}: '${value}'`);
    }
    return parsed;
};

const parseEnum = <T extends string>(value: string, allowed: readonly T[], option: string): T => {
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
        throw new ConfigurationError(`Invalid value for ${option}: '${value}' (expected one of ${allowed.join(', ')})`);
    }
    return match;
};

/** Only options given on the command line end up in the layer. */
export const toLayer = (args: RunArgs): ConfigLayer => {
    const layer: ConfigLayer = {};
    const asr: NonNullable<ConfigLayer['asr']> = {};
    const analysis: NonNullable<ConfigLayer['analysis']> = {};

    if (args.verbose !== undefined) layer.verbose = args.verbose;
    if (args.debug !== undefined) layer.debug = args.debug;
    if (args.show !== undefined) layer.show = args.show;
    if (args.rssUrl !== undefined) layer.rssUrl = args.rssUrl;
    if (args.youtubeUrl !== undefined) layer.youtubeUrl = args.youtubeUrl;
    if (args.date !== undefined) layer.date = args.date;
    if (args.titleContains !== undefined) layer.titleContains = args.titleContains;
    if (args.workdir !== undefined) layer.workdir = args.workdir;
    if (args.outputDirectory !== undefined) layer.outputDirectory = args.outputDirectory;

    if (args.asrModel !== undefined) asr.model = args.asrModel;
    if (args.asrCompute !== undefined) asr.compute = args.asrCompute;
    if (args.asrProvider !== undefined) asr.provider = args.asrProvider;
    if (args.asrPreset !== undefined) asr.preset = parseEnum<'precision' | 'recall' | 'balanced'>(args.asrPreset, ['precision', 'recall', 'balanced'], '--asr-preset');

    if (args.diarize !== undefined) layer.diarize = args.diarize;
    if (args.preprocess !== undefined) layer.preprocess = args.preprocess;
    if (args.restore !== undefined) layer.restore = args.restore;
    if (args.restoreModel !== undefined) layer.restoreModel = args.restoreModel;
    if (args.analyze !== undefined) layer.analyze = args.analyze;

    if (args.analysisModel !== undefined) analysis.model = args.analysisModel;
    if (args.analysisProvider !== undefined) analysis.provider = parseEnum<'command' | 'openai'>(args.analysisProvider, ['command', 'openai'], '--analysis-provider');
    if (args.analysisType !== undefined) analysis.type = parseEnum(args.analysisType, ANALYSIS_TYPES, '--analysis-type');
    if (args.temperature !== undefined) analysis.temperature = parseNumber(args.temperature, '--temperature', false);
    if (args.chunkChars !== undefined) analysis.maxCharsPerChunk = parseNumber(args.chunkChars, '--chunk-chars', true);
    if (args.concurrency !== undefined) analysis.concurrency = parseNumber(args.concurrency, '--concurrency', true);

    if (args.dual !== undefined) layer.dual = args.dual;
    if (args.consensus !== undefined) layer.consensus = args.consensus;
    if (args.export !== undefined) layer.export = args.export;
    if (args.formats !== undefined) layer.exportFormats = args.formats.split(',').map(format => format.trim()).filter(Boolean);
    if (args.publish !== undefined) layer.publish = args.publish;
    if (args.destination !== undefined) layer.publishDestination = args.destination;
    if (args.force !== undefined) {
        layer.force = args.force.map(kind => {
            if (!isStepKind(kind)) {
                throw new ConfigurationError(`Invalid value for --force: '${kind}' (expected one of ${STEP_KINDS.join(', ')})`);
            }
            return kind;
        });
    }
    if (args.retries !== undefined) layer.retries = parseNumber(args.retries, '--retries', true);
    if (args.timeout !== undefined) layer.stepTimeoutMs = parseNumber(args.timeout, '--timeout', true) * 1000;

    if (Object.keys(asr).length > 0) layer.asr = asr;
    if (Object.keys(analysis).length > 0) layer.analysis = analysis;
    return layer;
};

/** Model overrides taken from the environment. */
export const environmentLayer = (env: NodeJS.ProcessEnv): ConfigLayer => {
    const layer: ConfigLayer = {};
    if (env.PODLINE_ASR_MODEL) layer.asr = { model: env.PODLINE_ASR_MODEL };
    if (env.PODLINE_ANALYSIS_MODEL) layer.analysis = { model: env.PODLINE_ANALYSIS_MODEL };
    return layer;
};

/** `<output>/<show>/<YYYY-MM-DD>` unless a working directory was given. */
export const resolveWorkingDirectory = (config: PipelineConfiguration, today: Date = new Date()): string => {
    if (config.workdir) {
        return path.resolve(config.workdir);
    }
    if (!config.show) {
        throw new ConfigurationError('A working directory (--workdir) is required when no show name is given');
    }
    const date = config.date ? dayjs(config.date) : dayjs(today);
    if (!date.isValid()) {
        throw new ConfigurationError(`Invalid episode date: '${config.date}'`);
    }
    const showDirectory = config.show.trim().replace(/[\\/]+/g, '-');
    return path.resolve(config.outputDirectory, showDirectory, date.format(DEFAULT_EPISODE_DATE_FORMAT));
};

export const configure = async (args: RunArgs, env: NodeJS.ProcessEnv = process.env): Promise<RunConfiguration> => {
    const logger = getLogger();
    logger.debug('Command Line Options: %s', JSON.stringify(args, null, 2));

    let fidelity: Fidelity | undefined;
    if (args.fidelity !== undefined) {
        const level = parseNumber(args.fidelity, '--fidelity', true);
        if (!isFidelity(level)) {
            throw new ConfigurationError(`Invalid value for --fidelity: '${args.fidelity}' (expected 1-5)`);
        }
        fidelity = level;
    }
    let workflow: Workflow | undefined;
    if (args.workflow !== undefined) {
        if (!isWorkflow(args.workflow)) {
            throw new ConfigurationError(`Invalid value for --workflow: '${args.workflow}' (expected quick, analyze or publish)`);
        }
        workflow = args.workflow;
    }

    const file = await readConfigFile(args.config ?? DEFAULT_CONFIG_FILE);
    const config = resolveConfiguration({
        env: environmentLayer(env),
        file,
        fidelity,
        workflow,
        cli: toLayer(args),
    });

    const secureConfig = SecureConfigSchema.parse({
        openaiApiKey: env.OPENAI_API_KEY,
        openaiBaseUrl: env.OPENAI_BASE_URL,
    });
    if (config.analyze && config.analysis.provider === 'openai' && !secureConfig.openaiApiKey) {
        throw new ConfigurationError('OPENAI_API_KEY is required when the analysis provider is openai');
    }

    logger.debug('Final configuration: %s', JSON.stringify(config, null, 2));
    return { config, secureConfig, workingDirectory: resolveWorkingDirectory(config) };
};

const collect = (value: string, previous: string[] = []): string[] => [...previous, ...value.split(',').map(item => item.trim()).filter(Boolean)];

export const createProgram = (handlers: Handlers): Command => {
    const program = new Command();
    program
        .name(PROGRAM_NAME)
        .summary('Resumable podcast processing pipeline')
        .description('Fetch, transcribe, diarize, analyze, export and publish podcast episodes, resuming from whatever is already on disk')
        .version(VERSION);

    program
        .command('run')
        .description('run the pipeline for one episode')
        .option('--config <file>', 'YAML configuration file', DEFAULT_CONFIG_FILE)
        .option('--show <show>', 'show name to fetch')
        .option('--rss-url <rssUrl>', 'RSS feed to fetch from')
        .option('--youtube-url <youtubeUrl>', 'YouTube video to fetch')
        .option('--date <date>', 'episode publish date (YYYY-MM-DD)')
        .option('--title-contains <text>', 'pick the episode whose title contains this text')
        .option('--workdir <directory>', 'episode working directory (default: <output>/<show>/<date>)')
        .option('--output-directory <directory>', 'root directory for episode working directories')
        .option('--asr-model <model>', 'speech-to-text model')
        .option('--asr-compute <compute>', 'speech-to-text compute type')
        .option('--asr-provider <provider>', 'speech-to-text provider')
        .option('--asr-preset <preset>', 'speech-to-text preset (precision, recall, balanced)')
        .option('--diarize', 'identify speakers (includes word alignment)')
        .option('--no-diarize', 'skip speaker identification')
        .option('--preprocess', 'merge and normalize transcript segments')
        .option('--restore', 'restore punctuation and casing while preprocessing')
        .option('--restore-model <model>', 'model used for restoration')
        .option('--analyze', 'run the AI analysis')
        .option('--analysis-model <model>', 'AI model for analysis')
        .option('--analysis-provider <provider>', 'completion provider (command, openai)')
        .option('--analysis-type <type>', `analysis type (${ANALYSIS_TYPES.join(', ')})`)
        .option('--temperature <temperature>', 'model temperature')
        .option('--chunk-chars <chars>', 'approximate characters per analysis chunk')
        .option('--concurrency <count>', 'completion calls in flight, shared by both tracks')
        .option('--dual', 'run precision and recall tracks and reconcile them')
        .option('--consensus', 'reconcile the tracks in dual-track mode')
        .option('--no-consensus', 'skip agreement and consensus in dual-track mode')
        .option('--export', 'export transcript files')
        .option('--formats <formats>', 'comma-separated export formats')
        .option('--publish', 'publish the analysis')
        .option('--destination <destination>', 'publish destination')
        .option('--force <steps>', 'rerun these steps even when their artifacts exist', collect)
        .option('--retries <count>', 'retries per failed step')
        .option('--timeout <seconds>', 'timeout per external step in seconds')
        .option('--fidelity <level>', 'fidelity preset 1-5')
        .option('--workflow <workflow>', 'workflow preset (quick, analyze, publish)')
        .option('--verbose', 'enable verbose logging')
        .option('--debug', 'enable debug logging')
        .action(async (options: RunArgs) => handlers.run(options));

    program
        .command('status')
        .description('show detected progress for every episode under a directory')
        .argument('[root]', 'directory to scan', '.')
        .action(async (root: string) => handlers.status(root));

    return program;
};
