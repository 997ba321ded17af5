import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
    Handlers,
    RunArgs,
    configure,
    createProgram,
    environmentLayer,
    resolveWorkingDirectory,
    toLayer,
} from '../src/arguments';
import { ConfigurationError } from '../src/errors';
import { resolveConfiguration } from '../src/pipeline';

describe('arguments', () => {
    describe('toLayer', () => {
        test('should only set the options that were given', () => {
            expect(toLayer({})).toEqual({});
            expect(toLayer({ show: 'Example Show', diarize: false })).toEqual({ show: 'Example Show', diarize: false });
        });

        test('should group model options into their sections', () => {
            expect(toLayer({ asrModel: 'large-v3', asrPreset: 'recall', analysisModel: 'gpt-4o', temperature: '0.5', chunkChars: '12000' })).toEqual({
                asr: { model: 'large-v3', preset: 'recall' },
                analysis: { model: 'gpt-4o', temperature: 0.5, maxCharsPerChunk: 12000 },
            });
        });

        test('should convert lists, step names and the timeout', () => {
            expect(toLayer({ formats: 'txt, srt,,vtt', force: ['transcribe', 'analyze'], timeout: '90', retries: '2' })).toEqual({
                exportFormats: ['txt', 'srt', 'vtt'],
                force: ['transcribe', 'analyze'],
                stepTimeoutMs: 90000,
                retries: 2,
            });
        });

        test('should reject malformed values', () => {
            expect(() => toLayer({ retries: 'two' })).toThrow(new ConfigurationError("Invalid value for --retries: 'two'"));
            expect(() => toLayer({ concurrency: '1.5' })).toThrow("Invalid value for --concurrency: '1.5'");
            expect(() => toLayer({ temperature: ' ' })).toThrow(ConfigurationError);
            expect(() => toLayer({ force: ['align'] })).toThrow("Invalid value for --force: 'align'");
            expect(() => toLayer({ asrPreset: 'fast' })).toThrow("Invalid value for --asr-preset: 'fast' (expected one of precision, recall, balanced)");
            expect(() => toLayer({ analysisProvider: 'local' })).toThrow("Invalid value for --analysis-provider: 'local'");
        });
    });

    test('environmentLayer should read the model overrides', () => {
        expect(environmentLayer({})).toEqual({});
        expect(environmentLayer({ PODLINE_ASR_MODEL: 'small', PODLINE_ANALYSIS_MODEL: 'gpt-4o', PODLINE_OTHER: 'x' })).toEqual({
            asr: { model: 'small' },
            analysis: { model: 'gpt-4o' },
        });
    });

    describe('resolveWorkingDirectory', () => {
        test('should prefer an explicit working directory', () => {
            const config = resolveConfiguration({ cli: { workdir: 'episodes/custom', show: 'Example Show' } });

            expect(resolveWorkingDirectory(config)).toBe(path.resolve('episodes/custom'));
        });

        test('should derive the directory from show and date', () => {
            const config = resolveConfiguration({ cli: { show: 'Example/Show', date: '2024-05-01', outputDirectory: '/data/episodes' } });

            expect(resolveWorkingDirectory(config)).toBe(path.resolve('/data/episodes', 'Example-Show', '2024-05-01'));
        });

        test('should fall back to today', () => {
            const config = resolveConfiguration({ cli: { show: 'Example Show', outputDirectory: '/data/episodes' } });

            expect(resolveWorkingDirectory(config, new Date(2024, 0, 31))).toBe(path.resolve('/data/episodes', 'Example Show', '2024-01-31'));
        });

        test('should require a show or a working directory', () => {
            expect(() => resolveWorkingDirectory(resolveConfiguration()))
                .toThrow('A working directory (--workdir) is required when no show name is given');
        });

        test('should reject a date that does not parse', () => {
            const config = resolveConfiguration({ cli: { show: 'Example Show', date: 'someday' } });

            expect(() => resolveWorkingDirectory(config)).toThrow("Invalid episode date: 'someday'");
        });
    });

    describe('configure', () => {
        let directory: string;
        let configFile: string;

        beforeEach(async () => {
            directory = await fs.mkdtemp(path.join(os.tmpdir(), 'podline-arguments-'));
            configFile = path.join(directory, 'config.yaml');
            await fs.writeFile(configFile, ['show: File Show', 'analyze: true', 'analysis:', '  model: file-model'].join('\n'));
        });

        afterEach(async () => {
            await fs.rm(directory, { recursive: true, force: true });
        });

        test('should layer environment, file, presets and command line', async () => {
            const { config, secureConfig, workingDirectory } = await configure(
                { config: configFile, workdir: directory, workflow: 'quick', asrModel: 'large-v3' },
                { PODLINE_ASR_MODEL: 'small', PODLINE_ANALYSIS_MODEL: 'env-model', OPENAI_API_KEY: 'test-secret' },
            );

            expect(config.show).toBe('File Show');
            expect(config.asr.model).toBe('large-v3');
            expect(config.analysis.model).toBe('file-model');
            expect(config.analyze).toBe(false);
            expect(secureConfig).toEqual({ openaiApiKey: 'test-secret' });
            expect(workingDirectory).toBe(directory);
        });

        test('should apply a fidelity preset', async () => {
            const { config } = await configure({ config: configFile, workdir: directory, fidelity: '5' }, {});

            expect(config.dual).toBe(true);
            expect(config.restore).toBe(true);
        });

        test('should reject unknown presets', async () => {
            await expect(configure({ config: configFile, fidelity: '6' }, {})).rejects.toThrow("Invalid value for --fidelity: '6' (expected 1-5)");
            await expect(configure({ config: configFile, workflow: 'slow' }, {})).rejects.toThrow("Invalid value for --workflow: 'slow'");
        });

        test('should require an API key for the openai provider', async () => {
            await expect(configure({ config: configFile, workdir: directory, analysisProvider: 'openai' }, {}))
                .rejects.toThrow('OPENAI_API_KEY is required when the analysis provider is openai');
        });

        test('should treat a missing configuration file as empty', async () => {
            const { config } = await configure({ config: path.join(directory, 'missing.yaml'), workdir: directory }, {});

            expect(config.show).toBeUndefined();
            expect(config.analyze).toBe(false);
        });
    });

    describe('createProgram', () => {
        const parse = async (...args: string[]) => {
            const handlers: Handlers = {
                run: vi.fn(async () => undefined),
                status: vi.fn(async () => undefined),
            };
            const program = createProgram(handlers).exitOverride();
            await program.parseAsync(['node', 'podline', ...args]);
            return handlers;
        };

        const runArgs = (handlers: Handlers): RunArgs => {
            const run = vi.mocked(handlers.run);
            expect(run).toHaveBeenCalledTimes(1);
            return run.mock.calls[0][0];
        };

        test('should pass run options to the run handler', async () => {
            const handlers = await parse('run', '--show', 'Example Show', '--diarize', '--force', 'transcribe,analyze', '--force', 'export', '--retries', '2');

            expect(runArgs(handlers)).toMatchObject({
                show: 'Example Show',
                diarize: true,
                force: ['transcribe', 'analyze', 'export'],
                retries: '2',
            });
        });

        test('should leave unset booleans undefined so lower layers apply', async () => {
            const args = runArgs(await parse('run'));

            expect(args.diarize).toBeUndefined();
            expect(args.consensus).toBeUndefined();
            expect(args.config).toBe('./.podline/config.yaml');
        });

        test('should record negated flags', async () => {
            const args = runArgs(await parse('run', '--no-diarize', '--no-consensus'));

            expect(args.diarize).toBe(false);
            expect(args.consensus).toBe(false);
        });

        test('should pass the root to the status handler', async () => {
            const handlers = await parse('status', 'episodes');

            expect(handlers.status).toHaveBeenCalledWith('episodes');
            expect(handlers.run).not.toHaveBeenCalled();
        });
    });
});
