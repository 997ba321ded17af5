import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import * as Storage from '../../src/util/storage';

describe('Storage Utility', () => {
    const mockLog = vi.fn();
    let directory: string;
    let storage: Storage.Utility;

    beforeEach(async () => {
        vi.clearAllMocks();
        directory = await fs.mkdtemp(path.join(os.tmpdir(), 'podline-storage-'));
        storage = Storage.create({ log: mockLog });
    });

    afterEach(async () => {
        await fs.rm(directory, { recursive: true, force: true });
    });

    describe('exists', () => {
        test('should return true if path exists', async () => {
            await fs.writeFile(path.join(directory, 'present.json'), '{}');

            await expect(storage.exists(path.join(directory, 'present.json'))).resolves.toBe(true);
        });

        test('should return false if path does not exist', async () => {
            await expect(storage.exists(path.join(directory, 'absent.json'))).resolves.toBe(false);
        });
    });

    test('createDirectory should create nested directories and tolerate existing ones', async () => {
        const nested = path.join(directory, 'show', '2024-05-01');

        await storage.createDirectory(nested);
        await storage.createDirectory(nested);

        expect((await fs.stat(nested)).isDirectory()).toBe(true);
    });

    test('readJson should parse the file', async () => {
        await fs.writeFile(path.join(directory, 'episode.json'), '{"show":"Example Show"}');

        await expect(storage.readJson(path.join(directory, 'episode.json'))).resolves.toEqual({ show: 'Example Show' });
    });

    test('readJson should reject invalid JSON', async () => {
        await fs.writeFile(path.join(directory, 'broken.json'), '{"show":');

        await expect(storage.readJson(path.join(directory, 'broken.json'))).rejects.toThrow(SyntaxError);
    });

    describe('writeFileAtomic', () => {
        test('should write the content and leave no temporary file', async () => {
            const target = path.join(directory, 'audio-meta.json');

            await storage.writeFileAtomic(target, '{"audio_path":"/tmp/a.wav"}');

            await expect(storage.readFile(target)).resolves.toBe('{"audio_path":"/tmp/a.wav"}');
            expect(await fs.readdir(directory)).toEqual(['audio-meta.json']);
            expect(mockLog).toHaveBeenCalledWith('Wrote %s (%d bytes)', target, 27);
        });

        test('should replace existing content', async () => {
            const target = path.join(directory, 'audio-meta.json');
            await fs.writeFile(target, 'old');

            await storage.writeFileAtomic(target, 'new');

            await expect(storage.readFile(target)).resolves.toBe('new');
        });

        test('should fail and leave nothing behind when the directory is missing', async () => {
            const target = path.join(directory, 'missing', 'audio-meta.json');

            await expect(storage.writeFileAtomic(target, '{}')).rejects.toThrow();
            expect(await fs.readdir(directory)).toEqual([]);
            expect(mockLog).not.toHaveBeenCalled();
        });
    });

    test('temporaryNameFor should place a hidden file beside the target', () => {
        const temporary = Storage.temporaryNameFor('/episodes/example/audio-meta.json');

        expect(path.dirname(temporary)).toBe('/episodes/example');
        expect(path.basename(temporary)).toMatch(new RegExp(`^\\.audio-meta\\.json\\.tmp-${process.pid}-[0-9a-f]{8}$`));
    });

    test('listFiles should list regular files only', async () => {
        await fs.writeFile(path.join(directory, 'episode-meta.json'), '{}');
        await fs.mkdir(path.join(directory, '.lineage'));

        await expect(storage.listFiles(directory)).resolves.toEqual(['episode-meta.json']);
    });
});
