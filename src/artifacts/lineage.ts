/**
 * Lineage
 *
 * Explicit derivation records stored beside the artifacts in `.lineage/`.
 * File-name detection stays the fast path; a lineage record answers which
 * artifact another was computed from, by which operation, and how many times
 * it has been rewritten.
 */

import * as path from 'node:path';
import { z } from 'zod';
import { LINEAGE_DIRECTORY } from '../constants';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { STEP_KINDS } from '../types';
import { ARTIFACT_KINDS, LineageRecord } from './types';

const LineageRecordSchema = z.object({
    artifact: z.string(),
    kind: z.enum(ARTIFACT_KINDS),
    operation: z.enum(STEP_KINDS),
    parent: z.string().nullable(),
    parameters: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
    createdAt: z.string(),
    revision: z.number().int().positive(),
});

export type LineageEntry = Omit<LineageRecord, 'createdAt' | 'revision'>;

export interface Instance {
    read(workingDirectory: string, artifact: string): Promise<LineageRecord | undefined>;
    record(workingDirectory: string, entry: LineageEntry): Promise<LineageRecord>;
}

export const lineagePath = (workingDirectory: string, artifact: string): string =>
    path.join(workingDirectory, LINEAGE_DIRECTORY, artifact);

export const create = (options: { now?: () => Date } = {}): Instance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const now = options.now ?? (() => new Date());

    const read = async (workingDirectory: string, artifact: string): Promise<LineageRecord | undefined> => {
        const file = lineagePath(workingDirectory, artifact);
        if (!await storage.exists(file)) {
            return undefined;
        }
        let content: unknown;
        try {
            content = await storage.readJson(file);
        } catch (error) {
            logger.warn('Ignoring unreadable lineage record %s: %s', file, error);
            return undefined;
        }
        const parsed = LineageRecordSchema.safeParse(content);
        if (!parsed.success) {
            logger.warn('Ignoring malformed lineage record %s', file);
            return undefined;
        }
        return parsed.data;
    };

    const record = async (workingDirectory: string, entry: LineageEntry): Promise<LineageRecord> => {
        const previous = await read(workingDirectory, entry.artifact);
        if (previous) {
            logger.warn('Overwriting %s (revision %d -> %d)', entry.artifact, previous.revision, previous.revision + 1);
        }
        const lineage: LineageRecord = {
            ...entry,
            createdAt: now().toISOString(),
            revision: previous ? previous.revision + 1 : 1,
        };
        await storage.createDirectory(path.join(workingDirectory, LINEAGE_DIRECTORY));
        await storage.writeFileAtomic(lineagePath(workingDirectory, entry.artifact), JSON.stringify(lineage, null, 2));
        return lineage;
    };

    return { read, record };
};
