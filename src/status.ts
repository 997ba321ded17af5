/**
 * Episode status
 *
 * Reports how far each episode under a root directory has progressed, using
 * the same detection the orchestrator resumes from.
 */

import { glob } from 'glob';
import * as path from 'node:path';
import { Detector, Store } from './artifacts';
import * as Logging from './logging';
import { STEP_KINDS, StepKind } from './types';

export interface EpisodeStatus {
    workingDirectory: string;
    completedSteps: StepKind[];
    pendingSteps: StepKind[];
    artifacts: string[];
}

/** Episode working directories are the ones holding an episode-meta.json. */
export const findEpisodes = async (root: string): Promise<string[]> => {
    const matches = await glob(`**/${Store.fileNameFor({ kind: 'episode-meta' })}`, {
        cwd: root,
        nodir: true,
        absolute: true,
        ignore: ['**/node_modules/**'],
    });
    return [...new Set(matches.map(match => path.dirname(match)))].sort();
};

export const summarize = (detection: Detector.Detection): EpisodeStatus => ({
    workingDirectory: detection.workingDirectory,
    completedSteps: STEP_KINDS.filter(kind => detection.completedSteps.has(kind)),
    pendingSteps: STEP_KINDS.filter(kind => !detection.completedSteps.has(kind)),
    artifacts: detection.artifacts.map(artifact => artifact.fileName),
});

export const collect = async (root: string, detector: Detector.Instance = Detector.create()): Promise<EpisodeStatus[]> => {
    const logger = Logging.getLogger();
    const episodes = await findEpisodes(root);
    logger.debug('Found %d episode(s) under %s', episodes.length, root);

    const statuses: EpisodeStatus[] = [];
    for (const episode of episodes) {
        statuses.push(summarize(await detector.detect(episode)));
    }
    return statuses;
};

export const format = (status: EpisodeStatus, root: string): string => {
    const relative = path.relative(path.resolve(root), status.workingDirectory) || '.';
    const done = status.completedSteps.length > 0 ? status.completedSteps.join(', ') : 'nothing';
    return `${relative}: ${done} (${status.artifacts.length} artifact(s))`;
};
