/**
 * Artifact Detector
 *
 * Reconstructs which steps have completed from a single directory listing.
 * Only file names are inspected; payloads are loaded on demand.
 */

import * as path from 'node:path';
import { DetectorIOError } from '../errors';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { StepKind } from '../types';
import * as Store from './store';
import { ArtifactDescriptor, ArtifactKey, ArtifactKind, PRODUCING_STEP, StepParameters } from './types';

export interface Detection {
    workingDirectory: string;
    artifacts: ArtifactDescriptor[];
    completedSteps: Set<StepKind>;
    /** Identifying parameters for each completed step, one entry per artifact. */
    parameters: Map<StepKind, StepParameters[]>;
    ofKind(kind: ArtifactKind): ArtifactDescriptor[];
    find(key: ArtifactKey): ArtifactDescriptor | undefined;
    has(key: ArtifactKey): boolean;
}

export interface Instance {
    /** @throws DetectorIOError when the directory cannot be listed. */
    detect(workingDirectory: string): Promise<Detection>;
    load(descriptor: ArtifactDescriptor): Promise<unknown>;
}

export const buildDetection = (workingDirectory: string, fileNames: string[]): Detection => {
    const artifacts = fileNames
        .map(fileName => Store.describe(path.join(workingDirectory, fileName)))
        .filter((descriptor): descriptor is ArtifactDescriptor => descriptor !== undefined)
        .sort((a, b) => a.fileName.localeCompare(b.fileName));

    const completedSteps = new Set<StepKind>();
    const parameters = new Map<StepKind, StepParameters[]>();
    for (const artifact of artifacts) {
        const step = PRODUCING_STEP[artifact.kind];
        completedSteps.add(step);
        const entry: StepParameters = {
            fileName: artifact.fileName,
            ...(artifact.modelId && { modelId: artifact.modelId }),
            ...(artifact.sourceModelId && { sourceModelId: artifact.sourceModelId }),
            ...(artifact.track && { track: artifact.track }),
        };
        parameters.set(step, [...(parameters.get(step) ?? []), entry]);
    }

    const find = (key: ArtifactKey): ArtifactDescriptor | undefined =>
        artifacts.find(artifact => Store.sameKey(artifact, key));

    return {
        workingDirectory,
        artifacts,
        completedSteps,
        parameters,
        ofKind: (kind: ArtifactKind) => artifacts.filter(artifact => artifact.kind === kind),
        find,
        has: (key: ArtifactKey) => find(key) !== undefined,
    };
};

export const create = (): Instance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const detect = async (workingDirectory: string): Promise<Detection> => {
        let fileNames: string[];
        try {
            fileNames = await storage.listFiles(workingDirectory);
        } catch (error) {
            throw new DetectorIOError(workingDirectory, { cause: error });
        }

        const detection = buildDetection(workingDirectory, fileNames);
        logger.debug('Detected %d artifact(s) in %s: %s',
            detection.artifacts.length,
            workingDirectory,
            [...detection.completedSteps].join(', ') || 'none');
        return detection;
    };

    const load = async (descriptor: ArtifactDescriptor): Promise<unknown> => {
        return storage.readJson(descriptor.path);
    };

    return { detect, load };
};

