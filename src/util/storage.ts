import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import { DEFAULT_CHARACTER_ENCODING } from '../constants';

export interface Utility {
    exists(filePath: string): Promise<boolean>;
    createDirectory(directory: string): Promise<void>;
    readFile(filePath: string): Promise<string>;
    readJson(filePath: string): Promise<unknown>;
    /**
     * Write through a temporary file in the same directory followed by a rename,
     * so readers only ever observe the previous content or the complete new one.
     */
    writeFileAtomic(filePath: string, content: string): Promise<void>;
    listFiles(directory: string): Promise<string[]>;
}

export interface StorageOptions {
    log?: (message: string, ...args: unknown[]) => void;
}

export const temporaryNameFor = (filePath: string): string => {
    const suffix = crypto.randomBytes(4).toString('hex');
    return path.join(path.dirname(filePath), `.${path.basename(filePath)}.tmp-${process.pid}-${suffix}`);
};

export const create = (options: StorageOptions = {}): Utility => {
    const log = options.log ?? (() => undefined);

    const exists = async (filePath: string): Promise<boolean> => {
        try {
            await fs.access(filePath);
            return true;
        } catch {
            return false;
        }
    };

    const createDirectory = async (directory: string): Promise<void> => {
        await fs.mkdir(directory, { recursive: true });
    };

    const readFile = async (filePath: string): Promise<string> => {
        return fs.readFile(filePath, { encoding: DEFAULT_CHARACTER_ENCODING });
    };

    const readJson = async (filePath: string): Promise<unknown> => {
        const content = await readFile(filePath);
        return JSON.parse(content);
    };

    const writeFileAtomic = async (filePath: string, content: string): Promise<void> => {
        const temporary = temporaryNameFor(filePath);
        try {
            await fs.writeFile(temporary, content, { encoding: DEFAULT_CHARACTER_ENCODING });
            await fs.rename(temporary, filePath);
        } catch (error) {
            await fs.rm(temporary, { force: true });
            throw error;
        }
        log('Wrote %s (%d bytes)', filePath, Buffer.byteLength(content));
    };

    const listFiles = async (directory: string): Promise<string[]> => {
        const entries = await fs.readdir(directory, { withFileTypes: true });
        return entries.filter(entry => entry.isFile()).map(entry => entry.name);
    };

    return {
        exists,
        createDirectory,
        readFile,
        readJson,
        writeFileAtomic,
        listFiles,
    };
};
