import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { GradingSession } from '../types.js';
import { InMemoryResultStore, JsonFileResultStore, exportSubject, findSession, type ResultStore } from './resultStore.js';

const session = (student: string, subject: string, averageScore = 7): GradingSession => ({
    student,
    subject,
    questions: [
        {
            id: '1',
            score: averageScore,
            feedback: 'Good.',
            status: 'graded',
            referenceAnswer: 'Osmosis',
            studentAnswer: 'Water moves',
        },
    ],
    totalScore: averageScore,
    maxScore: 10,
    averageScore,
    percentage: averageScore * 10,
    overallFeedback: 'Well done.',
    gradedAt: '2026-03-02T09:00:00.000Z',
});

let root: string;

beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'grader-store-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(async () => {
    await rm(root, { recursive: true, force: true });
});

const stores: [string, () => ResultStore][] = [
    ['JsonFileResultStore', () => new JsonFileResultStore(root)],
    ['InMemoryResultStore', () => new InMemoryResultStore()],
];

describe.each(stores)('%s', (_, createStore) => {
    it('reads back what it stored', async () => {
        const store = createStore();
        const record = session('alice', 'Biology');

        expect(await store.put(record)).toEqual({ ok: true, value: undefined });
        expect(await store.get('alice', 'Biology')).toEqual({ ok: true, value: record });
    });

    it('returns undefined for a pair that was never stored', async () => {
        expect(await createStore().get('nobody', 'Biology')).toEqual({ ok: true, value: undefined });
    });

    it('replaces the record on a second put for the same student and subject', async () => {
        const store = createStore();
        await store.put(session('alice', 'Biology', 4));
        await store.put(session('alice', 'Biology', 9));

        const { sessions } = await store.list();
        expect(sessions).toHaveLength(1);
        expect(sessions[0].averageScore).toBe(9);
    });

    it('lists sessions sorted by subject then student, optionally filtered', async () => {
        const store = createStore();
        await store.put(session('carol', 'Physics'));
        await store.put(session('bob', 'Biology'));
        await store.put(session('alice', 'Biology'));

        const all = await store.list();
        expect(all.sessions.map((s) => `${s.subject}/${s.student}`)).toEqual([
            'Biology/alice',
            'Biology/bob',
            'Physics/carol',
        ]);
        expect(all.skipped).toEqual([]);

        const biology = await store.list({ subject: 'Biology' });
        expect(biology.sessions.map((s) => s.student)).toEqual(['alice', 'bob']);

        const bob = await store.list({ student: 'bob' });
        expect(bob.sessions.map((s) => s.subject)).toEqual(['Biology']);
    });

    it('exports one subject with a timestamp', async () => {
        const store = createStore();
        await store.put(session('alice', 'Biology'));
        await store.put(session('carol', 'Physics'));

        const exported = await exportSubject(store, 'Biology', new Date('2026-03-03T10:00:00.000Z'));

        expect(exported).toEqual({
            subject: 'Biology',
            exportedAt: '2026-03-03T10:00:00.000Z',
            sessions: [session('alice', 'Biology')],
        });
    });

    it('trims the subject it exports', async () => {
        const store = createStore();
        await store.put(session('alice', 'Biology'));

        const exported = await exportSubject(store, '  Biology ', new Date('2026-03-03T10:00:00.000Z'));

        expect(exported.subject).toBe('Biology');
        expect(exported.sessions).toEqual([session('alice', 'Biology')]);
    });

    it('finds a session by trimmed student and subject', async () => {
        const store = createStore();
        await store.put(session('alice', 'Biology'));

        expect(await findSession(store, ' alice ', ' Biology ')).toEqual({ ok: true, value: session('alice', 'Biology') });
    });

    it('reports a missing session or blank names as invalid input', async () => {
        const store = createStore();

        expect(await findSession(store, 'bob', 'Biology')).toMatchObject({
            ok: false,
            error: { kind: 'InvalidInput', message: 'No result for bob in Biology.' },
        });
        expect(await findSession(store, '  ', 'Biology')).toMatchObject({
            ok: false,
            error: { kind: 'InvalidInput', message: 'Both a student and a subject are required.' },
        });
    });
});

describe('JsonFileResultStore layout', () => {
    it('writes one pretty-printed JSON file per student under the subject', async () => {
        const store = new JsonFileResultStore(root);
        await store.put(session('alice', 'Biology'));

        const file = path.join(root, 'Biology', 'alice.json');
        expect(store.pathFor('alice', 'Biology')).toBe(file);
        expect(JSON.parse(await readFile(file, 'utf8'))).toEqual(session('alice', 'Biology'));
    });

    it('encodes names that are not safe as file names', async () => {
        const store = new JsonFileResultStore(root);

        expect(store.pathFor('../eve', 'Maths/Stats')).toBe(path.join(root, 'Maths%2FStats', '%2E.%2Feve.json'));

        await store.put(session('../eve', 'Maths/Stats'));
        expect(await store.get('../eve', 'Maths/Stats')).toMatchObject({ ok: true, value: { student: '../eve' } });
    });

    it('skips malformed records when listing', async () => {
        const store = new JsonFileResultStore(root);
        await store.put(session('alice', 'Biology'));
        await writeFile(path.join(root, 'Biology', 'broken.json'), '{ not json', 'utf8');
        await writeFile(path.join(root, 'Biology', 'partial.json'), JSON.stringify({ student: 'x' }), 'utf8');
        await writeFile(path.join(root, 'Biology', 'notes.txt'), 'ignored', 'utf8');

        const { sessions, skipped } = await store.list();

        expect(sessions.map((s) => s.student)).toEqual(['alice']);
        expect(skipped.map((record) => path.basename(record.location))).toEqual(['broken.json', 'partial.json']);
        expect(skipped[0].reason).toMatch(/^invalid JSON/);
    });

    it('reports a malformed record read directly as a persistence failure', async () => {
        const store = new JsonFileResultStore(root);
        await mkdir(path.join(root, 'Biology'), { recursive: true });
        await writeFile(store.pathFor('alice', 'Biology'), '[]', 'utf8');

        const result = await store.get('alice', 'Biology');

        expect(result).toMatchObject({ ok: false, error: { kind: 'PersistenceFailure' } });
    });

    it('reports a failed write as a persistence failure', async () => {
        const blocked = path.join(root, 'blocked');
        await writeFile(blocked, 'a file where the store expects a directory', 'utf8');
        const store = new JsonFileResultStore(blocked);

        const result = await store.put(session('alice', 'Biology'));

        expect(result).toMatchObject({ ok: false, error: { kind: 'PersistenceFailure' } });
    });

    it('lists nothing when the results directory does not exist yet', async () => {
        const store = new JsonFileResultStore(path.join(root, 'missing'));

        expect(await store.list()).toEqual({ sessions: [], skipped: [] });
    });
});
