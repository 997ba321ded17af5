/**
 * Artifact Store
 *
 * Pure naming rules: (working directory, artifact key) -> file path, and the
 * inverse. Nothing here touches the filesystem.
 *
 *   episode-meta.json
 *   audio-meta.json
 *   transcript-<asr>[__<track>].json
 *   transcript-diarized-<asr>[__<track>].json
 *   transcript-preprocessed-<asr>[__<track>].json
 *   analysis-<ai>+<asr>[__<track>].json
 *   agreement-<ai>+<asr>.json
 *   consensus-<ai>+<asr>.json
 *   export-<asr>.json
 *   publish-<destination>.json
 */

import * as path from 'node:path';
import { ConfigurationError } from '../errors';
import { isTrack } from '../types';
import { ArtifactDescriptor, ArtifactKey, ArtifactKind } from './types';

const EXTENSION = '.json';
const TRACK_SEPARATOR = '__';
const SOURCE_SEPARATOR = '+';
const MODEL_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9.-]*$/;

// Transcript model ids beginning with these would read as another transcript variant (or the retired aligned variant)
const RESERVED_MODEL_PREFIXES = ['diarized-', 'preprocessed-', 'aligned-'];

type Shape = 'single' | 'model' | 'model+source';

interface Convention {
    kind: ArtifactKind;
    prefix: string;
    shape: Shape;
    tracked: boolean;
    /** The model id names a speech-to-text model, which the reserved prefixes apply to. */
    transcript: boolean;
}

// Longest prefixes first so that "transcript-diarized-" wins over "transcript-"
const CONVENTIONS: Convention[] = [
    { kind: 'episode-meta', prefix: 'episode-meta', shape: 'single', tracked: false, transcript: false },
    { kind: 'audio-meta', prefix: 'audio-meta', shape: 'single', tracked: false, transcript: false },
    { kind: 'transcript-preprocessed', prefix: 'transcript-preprocessed-', shape: 'model', tracked: true, transcript: true },
    { kind: 'transcript-diarized', prefix: 'transcript-diarized-', shape: 'model', tracked: true, transcript: true },
    { kind: 'transcript-base', prefix: 'transcript-', shape: 'model', tracked: true, transcript: true },
    { kind: 'analysis', prefix: 'analysis-', shape: 'model+source', tracked: true, transcript: false },
    { kind: 'agreement', prefix: 'agreement-', shape: 'model+source', tracked: false, transcript: false },
    { kind: 'consensus', prefix: 'consensus-', shape: 'model+source', tracked: false, transcript: false },
    { kind: 'export', prefix: 'export-', shape: 'model', tracked: false, transcript: false },
    { kind: 'publish-receipt', prefix: 'publish-', shape: 'model', tracked: false, transcript: false },
];

const conventionFor = (kind: ArtifactKind): Convention => {
    const convention = CONVENTIONS.find(c => c.kind === kind);
    if (!convention) {
        throw new ConfigurationError(`Unknown artifact kind: ${kind}`);
    }
    return convention;
};

/** Source model ids of analyses are speech-to-text ids too, so `transcript` applies to them as well. */
export const isValidModelId = (modelId: string, transcript = false): boolean =>
    MODEL_ID_PATTERN.test(modelId) && !(transcript && RESERVED_MODEL_PREFIXES.some(prefix => modelId.startsWith(prefix)));

/**
 * Turn an arbitrary model or engine name ("openai/whisper-1", "gpt-4o:latest")
 * into an id usable in file names.
 */
export const sanitizeModelId = (raw: string): string => {
    const cleaned = raw.trim()
        .replace(/[^A-Za-z0-9.-]+/g, '-')
        .replace(/^[^A-Za-z0-9]+/, '')
        .replace(/-+$/, '');
    return cleaned || 'default';
};

const requireModelId = (value: string | undefined, what: string, kind: ArtifactKind, transcript: boolean): string => {
    if (value === undefined) {
        throw new ConfigurationError(`Artifact ${kind} requires a ${what}`);
    }
    if (!isValidModelId(value, transcript)) {
        throw new ConfigurationError(`Invalid ${what} for ${kind} artifact: "${value}"`);
    }
    return value;
};

export const fileNameFor = (key: ArtifactKey): string => {
    const convention = conventionFor(key.kind);

    if (key.track !== undefined && !convention.tracked) {
        throw new ConfigurationError(`Artifact ${key.kind} is shared by both tracks and cannot be track-qualified`);
    }
    const trackSuffix = key.track ? `${TRACK_SEPARATOR}${key.track}` : '';

    switch (convention.shape) {
        case 'single':
            return `${convention.prefix}${EXTENSION}`;
        case 'model': {
            const modelId = requireModelId(key.modelId, 'model id', key.kind, convention.transcript);
            return `${convention.prefix}${modelId}${trackSuffix}${EXTENSION}`;
        }
        case 'model+source': {
            const modelId = requireModelId(key.modelId, 'model id', key.kind, false);
            const sourceModelId = requireModelId(key.sourceModelId, 'source model id', key.kind, true);
            return `${convention.prefix}${modelId}${SOURCE_SEPARATOR}${sourceModelId}${trackSuffix}${EXTENSION}`;
        }
    }
};

export const locate = (workingDirectory: string, key: ArtifactKey): string =>
    path.join(workingDirectory, fileNameFor(key));

const parse = (convention: Convention, stem: string): ArtifactKey | undefined => {
    if (convention.shape === 'single') {
        return stem === convention.prefix ? { kind: convention.kind } : undefined;
    }
    if (!stem.startsWith(convention.prefix)) {
        return undefined;
    }

    let rest = stem.slice(convention.prefix.length);
    let track: ArtifactKey['track'];
    const separatorIndex = rest.lastIndexOf(TRACK_SEPARATOR);
    if (separatorIndex >= 0) {
        const candidate = rest.slice(separatorIndex + TRACK_SEPARATOR.length);
        if (!convention.tracked || !isTrack(candidate)) {
            return undefined;
        }
        track = candidate;
        rest = rest.slice(0, separatorIndex);
    }

    if (convention.shape === 'model') {
        if (!isValidModelId(rest, convention.transcript)) {
            return undefined;
        }
        return { kind: convention.kind, modelId: rest, ...(track && { track }) };
    }

    const parts = rest.split(SOURCE_SEPARATOR);
    if (parts.length !== 2 || !isValidModelId(parts[0]) || !isValidModelId(parts[1], true)) {
        return undefined;
    }
    return { kind: convention.kind, modelId: parts[0], sourceModelId: parts[1], ...(track && { track }) };
};

/**
 * Recover the artifact key from a file path. Files that follow no convention
 * (hidden and temporary files, legacy names, anything foreign) give `undefined`.
 */
export const describe = (filePath: string): ArtifactDescriptor | undefined => {
    const fileName = path.basename(filePath);
    if (fileName.startsWith('.') || !fileName.endsWith(EXTENSION)) {
        return undefined;
    }
    const stem = fileName.slice(0, -EXTENSION.length);

    for (const convention of CONVENTIONS) {
        if (convention.shape !== 'single' && !stem.startsWith(convention.prefix)) {
            continue;
        }
        const key = parse(convention, stem);
        if (key) {
            return { ...key, fileName, path: filePath };
        }
        // A longer prefix matched but the remainder is malformed: do not fall back to a shorter one
        if (convention.shape !== 'single') {
            return undefined;
        }
    }
    return undefined;
};

export const sameKey = (a: ArtifactKey, b: ArtifactKey): boolean =>
    a.kind === b.kind &&
    a.modelId === b.modelId &&
    a.sourceModelId === b.sourceModelId &&
    a.track === b.track;
