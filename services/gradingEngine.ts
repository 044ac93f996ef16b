import { Type, type Schema } from '@google/genai';
import { z } from 'zod';
import { describeError } from '../errors.js';
import type { AnswerSet, GradingOutcome, QuestionResult } from '../types.js';
import { mapInOrder } from '../utils/concurrency.js';
import { isFatalModelError, type ModelClient } from './modelClient.js';

export const MAX_QUESTION_SCORE = 10;

const NO_FEEDBACK = 'No feedback was provided for this answer.';

const gradingSchema: Schema = {
    type: Type.OBJECT,
    properties: {
        score: {
            type: Type.INTEGER,
            description: `Marks awarded for the student's answer, an integer from 0 to ${MAX_QUESTION_SCORE}.`,
        },
        feedback: {
            type: Type.STRING,
            description: 'One to three sentences explaining the score: what is correct, what is missing or wrong.',
        },
    },
    required: ['score', 'feedback'],
};

const SYSTEM_INSTRUCTION = `You are an experienced, fair examiner marking one answer at a time against the teacher's reference answer.
Award marks for meaning, not wording. Ignore spelling and handwriting transcription errors unless they change the meaning.
Always answer with a single JSON object of the form {"score": <integer 0-${MAX_QUESTION_SCORE}>, "feedback": "<string>"} and nothing else.`;

const buildGradingPrompt = (questionId: string, referenceAnswer: string, studentAnswer: string) => `
Question: ${questionId}

Reference answer:
"""
${referenceAnswer}
"""

Student answer:
"""
${studentAnswer || '(no answer written)'}
"""

Score the student answer from 0 to ${MAX_QUESTION_SCORE} and explain the score.`;

// "7", 7.5, "7/10", " 8 / 10 "
const ScoreSchema = z.union([
    z.number().finite(),
    z.string()
        .regex(/^\s*\d+(?:\.\d+)?\s*(?:\/\s*10\s*)?$/)
        .transform((value) => Number.parseFloat(value)),
]);

const GradingReplySchema = z.object({
    score: ScoreSchema,
    feedback: z.string().optional(),
});

const clampScore = (score: number) => Math.min(MAX_QUESTION_SCORE, Math.max(0, Math.round(score)));

function toOutcome(value: unknown): GradingOutcome | undefined {
    const parsed = GradingReplySchema.safeParse(value);
    if (!parsed.success) return undefined;
    const feedback = parsed.data.feedback?.trim();
    return { kind: 'ok', score: clampScore(parsed.data.score), feedback: feedback || NO_FEEDBACK };
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch {
        return { ok: false };
    }
}

/** Every balanced {...} span in the text, outermost first, skipping braces inside strings. */
function* jsonObjectFragments(text: string): Generator<string> {
    for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
        let depth = 0;
        let inString = false;
        let escaped = false;

        for (let i = start; i < text.length; i++) {
            const char = text[i];
            if (inString) {
                if (escaped) escaped = false;
                else if (char === '\\') escaped = true;
                else if (char === '"') inString = false;
                continue;
            }
            if (char === '"') inString = true;
            else if (char === '{') depth++;
            else if (char === '}' && --depth === 0) {
                yield text.slice(start, i + 1);
                break;
            }
        }
    }
}

/**
 * Reads a grading reply. The whole reply (minus any markdown code fence) is tried
 * first; failing that, the first JSON object embedded in the reply that has a
 * usable score.
 */
export function parseGradingResponse(raw: string): GradingOutcome {
    const text = raw.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');

    if (!text) {
        return { kind: 'parse-error', raw, reason: 'the model returned an empty response' };
    }

    const whole = tryParseJson(text);
    if (whole.ok) {
        const outcome = toOutcome(whole.value);
        if (outcome) return outcome;
    }

    for (const fragment of jsonObjectFragments(text)) {
        const parsed = tryParseJson(fragment);
        if (!parsed.ok) continue;
        const outcome = toOutcome(parsed.value);
        if (outcome) return outcome;
    }

    return {
        kind: 'parse-error',
        raw,
        reason: whole.ok
            ? 'the response did not contain a numeric score'
            : 'the response was not valid JSON',
    };
}

export interface GradeAnswersOptions {
    /** Questions graded at the same time. Results keep the answer key's order either way. */
    concurrency?: number;
}

async function gradeQuestion(
    id: string,
    referenceAnswer: string,
    studentAnswer: string,
    model: ModelClient,
): Promise<QuestionResult> {
    let raw: string;
    try {
        raw = await model.generate({
            purpose: 'grading',
            prompt: buildGradingPrompt(id, referenceAnswer, studentAnswer),
            systemInstruction: SYSTEM_INSTRUCTION,
            responseSchema: gradingSchema,
        });
    } catch (error) {
        if (isFatalModelError(error)) throw error;
        console.warn(`[grading] question ${id}: request failed: ${describeError(error)}`);
        return {
            id,
            score: 0,
            feedback: `This answer could not be scored because the grading request failed (${describeError(error)}).`,
            status: 'request-failure',
            referenceAnswer,
            studentAnswer,
        };
    }

    const outcome = parseGradingResponse(raw);
    if (outcome.kind === 'parse-error') {
        console.warn(`[grading] question ${id}: unreadable response: ${outcome.reason}`);
        return {
            id,
            score: 0,
            feedback: `This answer could not be scored because ${outcome.reason}.`,
            status: 'parse-failure',
            referenceAnswer,
            studentAnswer,
        };
    }

    return { id, score: outcome.score, feedback: outcome.feedback, status: 'graded', referenceAnswer, studentAnswer };
}

/**
 * Grades every question that appears in both the answer key and the script, in
 * answer key order. Questions on only one side are skipped. Failed or unreadable
 * grading replies become zero-score results with an explanation; only a fatal
 * model error rejects.
 */
export async function gradeAnswers(
    teacherAnswers: AnswerSet,
    studentAnswers: AnswerSet,
    model: ModelClient,
    options: GradeAnswersOptions = {},
): Promise<QuestionResult[]> {
    const matched = [...teacherAnswers].filter(([id]) => studentAnswers.has(id));

    return mapInOrder(
        matched,
        ([id, referenceAnswer]) => gradeQuestion(id, referenceAnswer, studentAnswers.get(id) ?? '', model),
        options.concurrency ?? 1,
    );
}
