export const VERSION = '0.1.0';
export const PROGRAM_NAME = 'podline';
export const DEFAULT_CHARACTER_ENCODING = 'utf-8';

export const DEFAULT_CONFIG_DIR = `./.${PROGRAM_NAME}`;
export const DEFAULT_CONFIG_FILE = `${DEFAULT_CONFIG_DIR}/config.yaml`;
export const DEFAULT_OUTPUT_DIRECTORY = './episodes';
export const DEFAULT_EPISODE_DATE_FORMAT = 'YYYY-MM-DD';

export const DEFAULT_VERBOSE = false;
export const DEFAULT_DEBUG = false;

// Speech-to-text
export const DEFAULT_ASR_MODEL = 'medium.en';
export const DEFAULT_ASR_COMPUTE = 'int8';
export const DEFAULT_ASR_PROVIDER = 'auto';
export const DEFAULT_AUDIO_FORMAT = 'wav16';

// Analysis
export const DEFAULT_ANALYSIS_MODEL = 'gpt-4.1';
export const DEFAULT_ANALYSIS_TEMPERATURE = 0.2;
export const DEFAULT_MAX_CHARS_PER_CHUNK = 24000;
export const DEFAULT_ANALYSIS_CONCURRENCY = 3;
export const DEFAULT_ANALYSIS_TYPE = 'general';

// Export / publish
export const DEFAULT_EXPORT_FORMATS = ['txt', 'srt'];
export const DEFAULT_PUBLISH_DESTINATION = 'notion';

// Step execution
export const DEFAULT_STEP_TIMEOUT_MS = 60 * 60 * 1000;
export const DEFAULT_KILL_GRACE_MS = 5000;
export const DEFAULT_STEP_RETRIES = 0;

/** Executables invoked for each external step; the first token is the program, the rest are fixed arguments. */
export const DEFAULT_STEP_COMMANDS = {
    fetch: ['podline-fetch'],
    transcode: ['podline-transcode'],
    transcribe: ['podline-transcribe'],
    diarize: ['podline-diarize'],
    preprocess: ['podline-preprocess'],
    complete: ['podline-complete'],
    export: ['podline-export'],
    publish: ['podline-publish'],
} as const;

export const LINEAGE_DIRECTORY = '.lineage';

export const PODLINE_DEFAULTS = {
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
    outputDirectory: DEFAULT_OUTPUT_DIRECTORY,
    audioFormat: DEFAULT_AUDIO_FORMAT,
    asr: {
        provider: DEFAULT_ASR_PROVIDER,
        model: DEFAULT_ASR_MODEL,
        compute: DEFAULT_ASR_COMPUTE,
    },
    diarize: false,
    preprocess: false,
    restore: false,
    analyze: false,
    analysis: {
        provider: 'command',
        model: DEFAULT_ANALYSIS_MODEL,
        temperature: DEFAULT_ANALYSIS_TEMPERATURE,
        type: DEFAULT_ANALYSIS_TYPE,
        maxCharsPerChunk: DEFAULT_MAX_CHARS_PER_CHUNK,
        concurrency: DEFAULT_ANALYSIS_CONCURRENCY,
    },
    dual: false,
    consensus: true,
    export: false,
    exportFormats: DEFAULT_EXPORT_FORMATS,
    publish: false,
    publishDestination: DEFAULT_PUBLISH_DESTINATION,
    force: [],
    retries: DEFAULT_STEP_RETRIES,
    stepTimeoutMs: DEFAULT_STEP_TIMEOUT_MS,
};
