import 'dotenv/config';
import * as AnalysisCommand from './analysis/command';
import * as AnalysisOpenAI from './analysis/openai';
import * as Arguments from './arguments';
import { createProcessRunner } from './contract';
import { PROGRAM_NAME, VERSION } from './constants';
import { ConfigurationError, DetectorIOError, describeFailure, errorMessage } from './errors';
import * as Executor from './executor';
import { getLogger, setLogLevel } from './logging';
import { Orchestrator, RunReport, buildSteps } from './pipeline';
import * as Status from './status';

export const printReport = (report: RunReport): void => {
    /* eslint-disable no-console */
    console.info('\n' + '='.repeat(60));
    console.info(`RUN ${report.status.toUpperCase()}`);
    console.info('='.repeat(60));
    console.info(`Working directory: ${report.workingDirectory}`);
    console.info(`Duration: ${(report.durationMs / 1000).toFixed(1)}s\n`);

    for (const record of report.steps) {
        const label = record.track ? `${record.step} [${record.track}]` : record.step;
        const detail = record.failure ? record.failure.message : record.artifact ?? '';
        console.info(`${label.padEnd(24)} ${record.status.padEnd(10)} ${detail}`);
    }

    if (report.warnings.length > 0) {
        console.info('\nWarnings:');
        for (const warning of report.warnings) {
            console.info(`  ${warning}`);
        }
    }
    if (report.failure) {
        const where = report.failure.track ? `${report.failure.step} [${report.failure.track}]` : report.failure.step;
        console.info(`\nAborted at ${where}: ${describeFailure(report.failure)}`);
    }
    console.info('='.repeat(60));
    /* eslint-enable no-console */
};

export const runCommand = async (args: Arguments.RunArgs): Promise<RunReport> => {
    if (args.debug === true) {
        setLogLevel('debug');
    } else if (args.verbose === true) {
        setLogLevel('verbose');
    }

    const { config, secureConfig, workingDirectory } = await Arguments.configure(args);
    const logger = getLogger();

    const executor = Executor.create({ runner: createProcessRunner() });
    const completion = config.analysis.provider === 'openai'
        ? AnalysisOpenAI.create({ apiKey: secureConfig.openaiApiKey, baseURL: secureConfig.openaiBaseUrl })
        : AnalysisCommand.create({
            executor,
            command: config.commands.complete,
            timeoutMs: config.stepTimeoutMs,
            cwd: workingDirectory,
        });

    const orchestrator = Orchestrator.create({
        executor,
        completion,
        commands: config.commands,
        onStepChange: record => logger.debug('Step %s%s is %s',
            record.step, record.track ? ` [${record.track}]` : '', record.status),
    });

    logger.info('Processing episode in %s', workingDirectory);
    return orchestrator.run({ workingDirectory, steps: buildSteps(config), dual: config.dual });
};

export const statusCommand = async (root: string): Promise<void> => {
    const statuses = await Status.collect(root);
    if (statuses.length === 0) {
        getLogger().info('No episodes found under %s', root);
        return;
    }
    for (const status of statuses) {
        // eslint-disable-next-line no-console
        console.info(Status.format(status, root));
    }
};

export async function main(argv: string[] = process.argv) {
    const logger = getLogger();
    logger.verbose('Starting %s: %s', PROGRAM_NAME, VERSION);

    const program = Arguments.createProgram({
        run: async args => {
            const report = await runCommand(args);
            printReport(report);
            if (report.status === 'Aborted') {
                process.exitCode = 1;
            }
        },
        status: statusCommand,
    });

    try {
        await program.parseAsync(argv);
    } catch (error) {
        if (error instanceof ConfigurationError || error instanceof DetectorIOError) {
            getLogger().error('%s', error.message);
        } else {
            getLogger().error('Exiting due to Error: %s', error instanceof Error && error.stack ? error.stack : errorMessage(error));
        }
        process.exitCode = 1;
    }
}
