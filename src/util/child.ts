import { spawn } from 'node:child_process';
import { DEFAULT_KILL_GRACE_MS } from '../constants';
import { ProcessOutcome, ProcessRequest, ProcessRunner } from '../contract/types';
import * as Logging from '../logging';

export interface RunnerOptions {
    /** Time between SIGTERM and SIGKILL once a timeout fires. */
    killGraceMs?: number;
}

export const create = (options: RunnerOptions = {}): ProcessRunner => {
    const logger = Logging.getLogger();
    const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

    const run = (request: ProcessRequest): Promise<ProcessOutcome> => new Promise(resolve => {
        const [program, ...fixedArgs] = request.command;
        if (!program) {
            resolve({
                exitCode: null,
                signal: null,
                stdout: '',
                stderr: '',
                timedOut: false,
                spawnError: new Error('Empty command'),
            });
            return;
        }

        const args = [...fixedArgs, ...request.args];
        logger.debug('Spawning %s %s', program, args.join(' '));

        let stdout = '';
        let stderr = '';
        let timedOut = false;
        let settled = false;
        let killTimer: NodeJS.Timeout | undefined;

        const child = spawn(program, args, { cwd: request.cwd, env: process.env });

        const timeoutTimer = request.timeoutMs !== undefined
            ? setTimeout(() => {
                timedOut = true;
                logger.warn('%s exceeded %d ms, terminating', program, request.timeoutMs);
                child.kill('SIGTERM');
                killTimer = setTimeout(() => child.kill('SIGKILL'), killGraceMs);
            }, request.timeoutMs)
            : undefined;

        const finish = (outcome: Omit<ProcessOutcome, 'stdout' | 'stderr' | 'timedOut'>) => {
            if (settled) {
                return;
            }
            settled = true;
            clearTimeout(timeoutTimer);
            clearTimeout(killTimer);
            resolve({ ...outcome, stdout, stderr, timedOut });
        };

        child.stdout.setEncoding('utf8');
        child.stderr.setEncoding('utf8');
        child.stdout.on('data', (chunk: string) => { stdout += chunk; });
        child.stderr.on('data', (chunk: string) => { stderr += chunk; });

        child.on('error', (error: Error) => {
            logger.debug('Failed to start %s: %s', program, error.message);
            finish({ exitCode: null, signal: null, spawnError: error });
        });

        child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
            finish({ exitCode, signal });
        });

        // A step that exits without reading its input closes the pipe early
        child.stdin.on('error', (error: Error) => {
            logger.debug('stdin of %s closed early: %s', program, error.message);
        });
        child.stdin.end(request.stdin ?? '');
    });

    return { run };
};
