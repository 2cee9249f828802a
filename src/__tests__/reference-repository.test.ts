import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import {
    ReferenceRepository,
    escapeLike,
    sanitizePage,
} from '../storage/reference-repository.js';
import type { Reference, Result, StoreConfig, StoreError } from '../types/index.js';
import {
    createLibrary,
    makeTempDir,
    numberedReferences,
    silentLogger,
    storeConfigFor,
} from './helpers/library.js';

function unwrap<T>(result: Result<T, StoreError>): T {
    if (!result.ok) throw new Error(`unexpected store error: ${result.error.message}`);
    return result.value;
}

const ids = (refs: Reference[]) => refs.map((r) => r.id);

describe('sanitizePage', () => {
    it('should keep valid input', () => {
        expect(sanitizePage(5, 3)).toEqual({ offset: 5, limit: 3 });
    });

    it('should coerce negative or non-integer offsets to 0', () => {
        expect(sanitizePage(-1, 3).offset).toBe(0);
        expect(sanitizePage(2.5, 3).offset).toBe(0);
        expect(sanitizePage(Number.NaN, 3).offset).toBe(0);
    });

    it('should coerce non-positive or non-integer limits to 10', () => {
        expect(sanitizePage(0, 0).limit).toBe(10);
        expect(sanitizePage(0, -4).limit).toBe(10);
        expect(sanitizePage(0, 1.5).limit).toBe(10);
    });
});

describe('escapeLike', () => {
    it('should escape wildcards and the escape character', () => {
        expect(escapeLike('50%_a\\b')).toBe('50\\%\\_a\\\\b');
    });
});

describe('ReferenceRepository', () => {
    let dir: string;
    let config: StoreConfig;
    let repo: ReferenceRepository;

    beforeEach(() => {
        dir = makeTempDir();
        config = storeConfigFor(dir);
        repo = new ReferenceRepository(config, { logger: silentLogger });
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('listPage', () => {
        beforeEach(() => {
            createLibrary(config.storePath, numberedReferences(25));
        });

        it('should return the newest ids first', () => {
            expect(ids(unwrap(repo.listPage(0, 10)))).toEqual([25, 24, 23, 22, 21, 20, 19, 18, 17, 16]);
        });

        it('should return the tail of the table for the last page', () => {
            expect(ids(unwrap(repo.listPage(20, 10)))).toEqual([5, 4, 3, 2, 1]);
        });

        it('should return disjoint consecutive pages in descending order', () => {
            const first = ids(unwrap(repo.listPage(0, 7)));
            const second = ids(unwrap(repo.listPage(7, 8)));

            expect(first.filter((id) => second.includes(id))).toEqual([]);
            const union = [...first, ...second];
            expect(union).toEqual([...union].sort((a, b) => b - a));
            expect(union).toHaveLength(15);
        });

        it('should treat invalid offset and limit as 0 and 10', () => {
            expect(ids(unwrap(repo.listPage(-3, 0)))).toEqual(ids(unwrap(repo.listPage(0, 10))));
            expect(ids(unwrap(repo.listPage(1.5, 2.5)))).toHaveLength(10);
        });

        it('should return an empty page past the end', () => {
            expect(unwrap(repo.listPage(100, 10))).toEqual([]);
        });
    });

    describe('row mapping', () => {
        it('should map columns to reference fields', () => {
            createLibrary(config.storePath, [
                {
                    id: 1,
                    title: 'Attention Mechanisms',
                    author: 'Doe, J.',
                    year: '2019',
                    secondary_title: 'Journal of Tests',
                    abstract: 'An abstract.',
                    keywords: 'attention; transformers',
                    files: ['internal-pdf://0001/attention.pdf'],
                },
            ]);

            expect(unwrap(repo.listPage(0, 10))).toEqual([
                {
                    id: 1,
                    title: 'Attention Mechanisms',
                    author: 'Doe, J.',
                    year: '2019',
                    journal: 'Journal of Tests',
                    abstract: 'An abstract.',
                    keywords: 'attention; transformers',
                    filepath: 'internal-pdf://0001/attention.pdf',
                },
            ]);
        });

        it('should return null filepath for references without attachments', () => {
            createLibrary(config.storePath, [{ id: 1, title: 'No File' }]);
            expect(unwrap(repo.listPage(0, 10))[0]?.filepath).toBeNull();
        });

        it('should list a reference with several attachments once, with its first file', () => {
            createLibrary(config.storePath, [
                { id: 1, title: 'Two Files', files: ['internal-pdf://a.pdf', 'internal-pdf://b.pdf'] },
                { id: 2, title: 'One File', files: ['internal-pdf://c.pdf'] },
            ]);

            const refs = unwrap(repo.listPage(0, 10));
            expect(ids(refs)).toEqual([2, 1]);
            expect(refs[1]?.filepath).toBe('internal-pdf://a.pdf');
        });

        it('should yield null keywords when the column does not exist', () => {
            createLibrary(config.storePath, [{ id: 1, title: 'Old Schema' }], { withKeywords: false });

            const refs = unwrap(repo.listPage(0, 10));
            expect(refs).toHaveLength(1);
            expect(refs[0]?.keywords).toBeNull();
        });

        it('should return numeric years as text', () => {
            createLibrary(
                config.storePath,
                [
                    { id: 1, title: 'Integer Year', year: 2020 },
                    { id: 2, title: 'Text Year', year: '2021a' },
                    { id: 3, title: 'Real Year', year: 2019.5 },
                ],
                { untypedYear: true }
            );

            expect(unwrap(repo.listPage(0, 10)).map((r) => r.year)).toEqual(['2019.5', '2021a', '2020']);
        });
    });

    describe('searchByTitle', () => {
        beforeEach(() => {
            createLibrary(config.storePath, [
                { id: 1, title: 'Knowledge Distillation Review', year: '2020' },
                { id: 2, title: 'A Survey of DISTILLATION Methods', year: '2023' },
                { id: 3, title: 'Graph Neural Networks', year: '2021' },
                { id: 4, title: '知识蒸馏综述', year: '2022' },
                { id: 5, title: 'Reaching 100% Recall', year: '2019' },
                { id: 6, title: 'Recall at 100 Percent', year: '2018' },
            ]);
        });

        it('should match case-insensitively and order by year descending', () => {
            expect(ids(unwrap(repo.searchByTitle('distillation')))).toEqual([2, 1]);
        });

        it('should match non-Latin titles by substring', () => {
            expect(ids(unwrap(repo.searchByTitle('蒸馏')))).toEqual([4]);
        });

        it('should return every reference for an empty query', () => {
            expect(ids(unwrap(repo.searchByTitle('')))).toEqual([2, 4, 3, 1, 5, 6]);
        });

        it('should treat % as a literal character', () => {
            expect(ids(unwrap(repo.searchByTitle('100%')))).toEqual([5]);
        });

        it('should leave out references without a title, even for an empty query', () => {
            createLibrary(path.join(dir, 'untitled.enl'), [
                { id: 1, title: 'Titled One' },
                { id: 2, title: null },
                { id: 3, title: 'Titled Three' },
            ]);
            const untitledRepo = new ReferenceRepository(
                { ...config, activeStorePath: path.join(dir, 'untitled.enl') },
                { logger: silentLogger }
            );

            expect(ids(unwrap(untitledRepo.searchByTitle('')))).toEqual([1, 3]);
            expect(ids(unwrap(untitledRepo.listPage(0, 10)))).toEqual([3, 2, 1]);
        });

        it('should return nothing when no title matches', () => {
            expect(unwrap(repo.searchByTitle('quantum'))).toEqual([]);
        });
    });

    describe('findFirstByTitle', () => {
        beforeEach(() => {
            createLibrary(config.storePath, [
                {
                    id: 1,
                    title: 'Knowledge Distillation Review',
                    files: ['internal-pdf://papers/kd.pdf'],
                },
                { id: 2, title: 'Unattached Notes' },
            ]);
        });

        it('should return the matching reference', () => {
            const ref = unwrap(repo.findFirstByTitle('distillation'));
            expect(ref?.id).toBe(1);
            expect(ref?.filepath).toBe('internal-pdf://papers/kd.pdf');
        });

        it('should return null when nothing matches', () => {
            expect(unwrap(repo.findFirstByTitle('missing'))).toBeNull();
        });

        it('should return null when the match has no attachment', () => {
            expect(unwrap(repo.findFirstByTitle('unattached'))).toBeNull();
        });
    });

    describe('failures', () => {
        it('should report a connection error when the library file is missing', () => {
            const result = repo.listPage(0, 10);
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe('connection');
                expect(result.error.path).toBe(config.storePath);
            }
        });

        it('should report a query error when the file is not a library', () => {
            fs.writeFileSync(config.storePath, 'this is not an sqlite database, just some text padding it out');
            const result = repo.searchByTitle('x');
            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.message).toContain('not a database');
        });

        it('should report a query error when the tables are missing', () => {
            fs.writeFileSync(config.storePath, '');
            const result = repo.findFirstByTitle('x');
            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.kind).toBe('query');
        });

        it('should read the snapshot in snapshot mode', () => {
            const snapshotConfig = storeConfigFor(dir, { useBackup: true });
            createLibrary(snapshotConfig.snapshotPath, [{ id: 7, title: 'Only In Snapshot' }]);
            createLibrary(snapshotConfig.storePath, [{ id: 1, title: 'Only In Original' }]);

            const snapshotRepo = new ReferenceRepository(snapshotConfig, { logger: silentLogger });
            expect(ids(unwrap(snapshotRepo.listPage(0, 10)))).toEqual([7]);
        });
    });
});
