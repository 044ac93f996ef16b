import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { GraderError, describeError, fail, ok, type Result } from '../errors.js';
import type { GradingSession } from '../types.js';

const QuestionResultSchema = z.object({
    id: z.string(),
    score: z.number().int().min(0).max(10),
    feedback: z.string(),
    status: z.enum(['graded', 'parse-failure', 'request-failure']),
    referenceAnswer: z.string(),
    studentAnswer: z.string(),
});

export const GradingSessionSchema = z.object({
    student: z.string().min(1),
    subject: z.string().min(1),
    questions: z.array(QuestionResultSchema),
    totalScore: z.number(),
    maxScore: z.number(),
    averageScore: z.number(),
    percentage: z.number(),
    overallFeedback: z.string(),
    gradedAt: z.string(),
});

export interface SkippedRecord {
    location: string;
    reason: string;
}

export interface SessionListing {
    sessions: GradingSession[];
    skipped: SkippedRecord[];
}

export interface SessionFilter {
    subject?: string;
    student?: string;
}

export interface SubjectExport {
    subject: string;
    exportedAt: string;
    sessions: GradingSession[];
}

/** Graded sessions addressed by (student, subject); a put replaces any earlier record. */
export interface ResultStore {
    get(student: string, subject: string): Promise<Result<GradingSession | undefined>>;
    put(session: GradingSession): Promise<Result<void>>;
    list(filter?: SessionFilter): Promise<SessionListing>;
}

const bySubjectThenStudent = (a: GradingSession, b: GradingSession) =>
    a.subject.localeCompare(b.subject) || a.student.localeCompare(b.student);

const matches = (session: GradingSession, filter: SessionFilter) =>
    (filter.subject === undefined || session.subject === filter.subject) &&
    (filter.student === undefined || session.student === filter.student);

export async function exportSubject(store: ResultStore, subject: string, now = new Date()): Promise<SubjectExport> {
    const name = subject.trim();
    const { sessions } = await store.list({ subject: name });
    return { subject: name, exportedAt: now.toISOString(), sessions };
}

/** Looks up one stored session; names are trimmed the way the grading run trims them. */
export async function findSession(store: ResultStore, student: string, subject: string): Promise<Result<GradingSession>> {
    const studentId = student.trim();
    const subjectName = subject.trim();
    if (!studentId || !subjectName) {
        return fail(new GraderError('InvalidInput', 'Both a student and a subject are required.'));
    }

    const session = await store.get(studentId, subjectName);
    if (!session.ok) return session;
    if (!session.value) return fail(new GraderError('InvalidInput', `No result for ${studentId} in ${subjectName}.`));
    return ok(session.value);
}

const encodeSegment = (value: string) => encodeURIComponent(value).replace(/\*/g, '%2A').replace(/^\./, '%2E');

/**
 * Stores each session as `<root>/<subject>/<student>.json`, both names URI-encoded.
 */
export class JsonFileResultStore implements ResultStore {
    constructor(private readonly root: string) {}

    pathFor(student: string, subject: string): string {
        return path.join(this.root, encodeSegment(subject), `${encodeSegment(student)}.json`);
    }

    async get(student: string, subject: string): Promise<Result<GradingSession | undefined>> {
        const file = this.pathFor(student, subject);
        let content: string;
        try {
            content = await readFile(file, 'utf8');
        } catch (error) {
            if (isNotFound(error)) return ok(undefined);
            return fail(new GraderError('PersistenceFailure', `Could not read ${file}: ${describeError(error)}`, { cause: error }));
        }

        const parsed = parseRecord(content);
        if (!parsed.ok) {
            return fail(new GraderError('PersistenceFailure', `${file} is not a valid result record: ${parsed.error}`));
        }
        return ok(parsed.value);
    }

    async put(session: GradingSession): Promise<Result<void>> {
        const file = this.pathFor(session.student, session.subject);
        try {
            await mkdir(path.dirname(file), { recursive: true });
            await writeFile(file, `${JSON.stringify(session, null, 2)}\n`, 'utf8');
            return ok(undefined);
        } catch (error) {
            return fail(new GraderError(
                'PersistenceFailure',
                `Could not save the result for ${session.student} (${session.subject}): ${describeError(error)}`,
                { cause: error },
            ));
        }
    }

    async list(filter: SessionFilter = {}): Promise<SessionListing> {
        const sessions: GradingSession[] = [];
        const skipped: SkippedRecord[] = [];

        const subjectDirs = filter.subject === undefined
            ? await this.readEntries(this.root, 'directories', skipped)
            : [encodeSegment(filter.subject)];

        for (const subjectDir of subjectDirs) {
            const dir = path.join(this.root, subjectDir);
            const files = (await this.readEntries(dir, 'files', skipped)).filter((name) => name.endsWith('.json'));

            for (const name of files) {
                const location = path.join(dir, name);
                let content: string;
                try {
                    content = await readFile(location, 'utf8');
                } catch (error) {
                    skip(skipped, location, describeError(error));
                    continue;
                }

                const parsed = parseRecord(content);
                if (!parsed.ok) {
                    skip(skipped, location, parsed.error);
                    continue;
                }
                if (matches(parsed.value, filter)) sessions.push(parsed.value);
            }
        }

        return { sessions: sessions.sort(bySubjectThenStudent), skipped };
    }

    private async readEntries(dir: string, want: 'directories' | 'files', skipped: SkippedRecord[]): Promise<string[]> {
        try {
            const entries = await readdir(dir, { withFileTypes: true });
            return entries
                .filter((entry) => (want === 'directories' ? entry.isDirectory() : entry.isFile()))
                .map((entry) => entry.name)
                .sort();
        } catch (error) {
            if (!isNotFound(error)) skip(skipped, dir, describeError(error));
            return [];
        }
    }
}

/** Keeps sessions in memory for the lifetime of the process. */
export class InMemoryResultStore implements ResultStore {
    private readonly records = new Map<string, string>();

    private static key(student: string, subject: string) {
        return JSON.stringify([subject, student]);
    }

    async get(student: string, subject: string): Promise<Result<GradingSession | undefined>> {
        const content = this.records.get(InMemoryResultStore.key(student, subject));
        if (content === undefined) return ok(undefined);
        const parsed = parseRecord(content);
        return parsed.ok ? ok(parsed.value) : fail(new GraderError('PersistenceFailure', parsed.error));
    }

    async put(session: GradingSession): Promise<Result<void>> {
        this.records.set(InMemoryResultStore.key(session.student, session.subject), JSON.stringify(session));
        return ok(undefined);
    }

    async list(filter: SessionFilter = {}): Promise<SessionListing> {
        const sessions: GradingSession[] = [];
        const skipped: SkippedRecord[] = [];
        for (const [key, content] of this.records) {
            const parsed = parseRecord(content);
            if (!parsed.ok) {
                skip(skipped, key, parsed.error);
            } else if (matches(parsed.value, filter)) {
                sessions.push(parsed.value);
            }
        }
        return { sessions: sessions.sort(bySubjectThenStudent), skipped };
    }
}

function parseRecord(content: string): Result<GradingSession, string> {
    let value: unknown;
    try {
        value = JSON.parse(content);
    } catch (error) {
        return fail(`invalid JSON (${describeError(error)})`);
    }
    const parsed = GradingSessionSchema.safeParse(value);
    if (!parsed.success) {
        return fail(parsed.error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`).join('; '));
    }
    return ok(parsed.data);
}

function skip(skipped: SkippedRecord[], location: string, reason: string) {
    console.warn(`[store] skipping ${location}: ${reason}`);
    skipped.push({ location, reason });
}

const isNotFound = (error: unknown) =>
    error instanceof Error && 'code' in error && error.code === 'ENOENT';
