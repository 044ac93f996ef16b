import { GraderError, fail, ok, type Result } from '../errors.js';
import type {
    AnswerSet,
    ContentStyle,
    DocumentRole,
    GradingSession,
    QuestionResult,
    UploadedFile,
} from '../types.js';
import { baseName } from '../utils/fileUtils.js';
import { roundTo } from '../utils/statistics.js';
import { isWholeTextFallback, segmentAnswers } from './answerSegmenter.js';
import { loadDocument, type DocumentLoaderOptions } from './documentLoader.js';
import { MAX_QUESTION_SCORE, gradeAnswers } from './gradingEngine.js';
import { isFatalModelError, type ModelClient } from './modelClient.js';
import { generateOverallFeedback } from './overallFeedback.js';
import type { ResultStore } from './resultStore.js';
import { extractText } from './textExtractor.js';

export const DEFAULT_MAX_SCRIPTS_PER_BATCH = 30;

export interface ScriptSubmission {
    file: UploadedFile;
    /** Defaults to the file name without its extension. */
    student?: string;
}

export interface GradeScriptsRequest {
    subject: string;
    answerKey: UploadedFile;
    scripts: ScriptSubmission[];
}

export interface GradingDependencies {
    model: ModelClient;
    store: ResultStore;
    concurrency?: number;
    maxScriptsPerBatch?: number;
    loader?: DocumentLoaderOptions;
    now?: () => Date;
}

interface ScriptOutcomeBase {
    student: string;
    fileName: string;
}

interface GradedOutcomeBase extends ScriptOutcomeBase {
    status: 'graded';
    session: GradingSession;
    /** Pages whose text could not be read; they were graded as blank. */
    failedPages: number[];
}

export type ScriptOutcome =
    | (GradedOutcomeBase & { saved: true })
    | (GradedOutcomeBase & { saved: false; persistenceError: GraderError })
    | (ScriptOutcomeBase & { status: 'skipped'; error: GraderError });

export interface GradingBatch {
    subject: string;
    answerKeyName: string;
    questionIds: string[];
    wholeTextKey: boolean;
    /** Answer key pages whose text could not be read; their questions are missing. */
    answerKeyFailedPages: number[];
    scripts: ScriptOutcome[];
}

interface PreparedAnswers {
    answers: AnswerSet;
    failedPages: number[];
}

/**
 * State of one grading run. Created when a run starts and closed when it ends;
 * the documents it loads do not outlive it.
 */
export class GradingContext {
    readonly outcomes: ScriptOutcome[] = [];
    private answerKey?: AnswerSet;
    private closed = false;

    constructor(readonly subject: string, readonly deps: GradingDependencies) {}

    get teacherAnswers(): AnswerSet {
        if (!this.answerKey) throw new Error('The answer key has not been prepared for this run.');
        return this.answerKey;
    }

    async prepare(file: UploadedFile, role: DocumentRole): Promise<Result<PreparedAnswers>> {
        if (this.closed) return fail(new GraderError('InvalidInput', 'This grading run has already finished.'));

        const style: ContentStyle = role === 'answer-key' ? 'typed' : 'handwritten';
        const document = await loadDocument(file, role, this.deps.loader);
        if (!document.ok) return document;

        const extracted = await extractText(document.value, this.deps.model, style);
        if (!extracted.ok) return extracted;

        const answers = segmentAnswers(extracted.value.text);
        if (role === 'answer-key') this.answerKey = answers;
        return ok({ answers, failedPages: extracted.value.failedPages });
    }

    close(): void {
        this.closed = true;
        this.answerKey = undefined;
    }
}

/** Builds the session record; the aggregate score is the mean question score. */
export function buildSession(
    student: string,
    subject: string,
    questions: QuestionResult[],
    overallFeedback: string,
    gradedAt: Date,
): GradingSession {
    const totalScore = questions.reduce((sum, question) => sum + question.score, 0);
    const maxScore = questions.length * MAX_QUESTION_SCORE;

    return {
        student,
        subject,
        questions,
        totalScore,
        maxScore,
        averageScore: questions.length === 0 ? 0 : roundTo(totalScore / questions.length),
        percentage: maxScore === 0 ? 0 : roundTo((totalScore / maxScore) * 100),
        overallFeedback,
        gradedAt: gradedAt.toISOString(),
    };
}

function validateRequest(request: GradeScriptsRequest, limit: number): GraderError | undefined {
    if (!request.subject.trim()) {
        return new GraderError('InvalidInput', 'A subject is required.');
    }
    if (request.scripts.length === 0) {
        return new GraderError('InvalidInput', 'Provide an answer key and at least one student script.');
    }
    if (request.scripts.length > limit) {
        return new GraderError(
            'InvalidInput',
            `At most ${limit} student scripts can be graded at a time (got ${request.scripts.length}).`,
        );
    }
    const students = request.scripts.map((script) => script.student?.trim() || baseName(script.file.name));
    const duplicate = students.find((student, index) => students.indexOf(student) !== index);
    if (duplicate !== undefined) {
        return new GraderError('InvalidInput', `Two scripts resolve to the same student "${duplicate}".`);
    }
    return undefined;
}

async function gradeScript(context: GradingContext, submission: ScriptSubmission): Promise<Result<ScriptOutcome>> {
    const { model, store, concurrency, now = () => new Date() } = context.deps;
    const student = submission.student?.trim() || baseName(submission.file.name);
    const fileName = submission.file.name;

    console.log(`[grade] ${student}: reading ${fileName}`);
    const prepared = await context.prepare(submission.file, 'student-script');
    if (!prepared.ok) {
        if (isFatalModelError(prepared.error.cause)) return prepared;
        console.warn(`[grade] ${student}: skipped: ${prepared.error.message}`);
        return ok({ status: 'skipped', student, fileName, error: prepared.error });
    }

    let questions: QuestionResult[];
    let overallFeedback: string;
    try {
        questions = await gradeAnswers(context.teacherAnswers, prepared.value.answers, model, { concurrency });
        const totalScore = questions.reduce((sum, question) => sum + question.score, 0);
        overallFeedback = await generateOverallFeedback(
            { student, subject: context.subject, totalScore, maxScore: questions.length * MAX_QUESTION_SCORE, questions },
            model,
        );
    } catch (error) {
        if (!isFatalModelError(error)) throw error;
        return fail(new GraderError('ModelFailure', `Grading ${fileName} failed: ${error.message}`, { cause: error }));
    }

    const session = buildSession(student, context.subject, questions, overallFeedback, now());
    const { failedPages } = prepared.value;

    const saved = await store.put(session);
    if (!saved.ok) {
        console.error(`[grade] ${student}: ${saved.error.message}`);
        return ok({ status: 'graded', student, fileName, session, failedPages, saved: false, persistenceError: saved.error });
    }

    console.log(`[grade] ${student}: ${session.totalScore}/${session.maxScore} (${session.percentage}%)`);
    return ok({ status: 'graded', student, fileName, session, failedPages, saved: true });
}

/**
 * Grades a batch of student scripts against one answer key and saves each session.
 * Only a problem with the answer key, an invalid request or a fatal model error
 * fails the whole batch; a script that cannot be read is reported as skipped.
 * A fatal model error stops before the current script is saved, so earlier
 * results for that student are kept.
 */
export async function gradeScripts(
    request: GradeScriptsRequest,
    deps: GradingDependencies,
): Promise<Result<GradingBatch>> {
    const invalid = validateRequest(request, deps.maxScriptsPerBatch ?? DEFAULT_MAX_SCRIPTS_PER_BATCH);
    if (invalid) return fail(invalid);

    const context = new GradingContext(request.subject.trim(), deps);
    try {
        console.log(`[grade] reading answer key ${request.answerKey.name}`);
        const key = await context.prepare(request.answerKey, 'answer-key');
        if (!key.ok) return key;
        console.log(`[grade] answer key has ${key.value.answers.size} question(s)`);
        if (key.value.failedPages.length > 0) {
            console.warn(`[grade] answer key pages ${key.value.failedPages.join(', ')} could not be read`);
        }

        for (const submission of request.scripts) {
            const outcome = await gradeScript(context, submission);
            if (!outcome.ok) return outcome;
            context.outcomes.push(outcome.value);
        }

        return ok({
            subject: context.subject,
            answerKeyName: request.answerKey.name,
            questionIds: [...key.value.answers.keys()],
            wholeTextKey: isWholeTextFallback(key.value.answers),
            answerKeyFailedPages: key.value.failedPages,
            scripts: [...context.outcomes],
        });
    } finally {
        context.close();
    }
}
