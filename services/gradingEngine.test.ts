import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { AnswerSet } from '../types.js';
import { gradeAnswers, parseGradingResponse } from './gradingEngine.js';
import { ModelRequestError, type ModelClient, type ModelRequest } from './modelClient.js';

const answers = (entries: [string, string][]): AnswerSet => new Map(entries);

const fakeModel = () => {
    const generate = vi.fn<ModelClient['generate']>();
    return { model: { generate } satisfies ModelClient, generate };
};

beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
});

describe('parseGradingResponse', () => {
    it('reads a plain JSON reply', () => {
        expect(parseGradingResponse('{"score": 8, "feedback": "Clear and correct."}')).toEqual({
            kind: 'ok',
            score: 8,
            feedback: 'Clear and correct.',
        });
    });

    it('strips a markdown code fence', () => {
        expect(parseGradingResponse('```json\n{"score": 7, "feedback": "Mostly right."}\n```')).toEqual({
            kind: 'ok',
            score: 7,
            feedback: 'Mostly right.',
        });
    });

    it('finds a JSON object inside surrounding prose and reads "7/10"', () => {
        const outcome = parseGradingResponse('Here is my assessment: {"score": "7/10", "feedback": "Close."} Thanks!');
        expect(outcome).toEqual({ kind: 'ok', score: 7, feedback: 'Close.' });
    });

    it('rounds and clamps scores into 0-10', () => {
        expect(parseGradingResponse('{"score": 14, "feedback": "x"}')).toMatchObject({ score: 10 });
        expect(parseGradingResponse('{"score": -3, "feedback": "x"}')).toMatchObject({ score: 0 });
        expect(parseGradingResponse('{"score": 6.6, "feedback": "x"}')).toMatchObject({ score: 7 });
    });

    it('fills in feedback when the reply has none', () => {
        expect(parseGradingResponse('{"score": 5}')).toEqual({
            kind: 'ok',
            score: 5,
            feedback: 'No feedback was provided for this answer.',
        });
    });

    it('reports an empty reply', () => {
        expect(parseGradingResponse('   ')).toEqual({
            kind: 'parse-error',
            raw: '   ',
            reason: 'the model returned an empty response',
        });
    });

    it('reports a reply that is not JSON', () => {
        expect(parseGradingResponse('I would give this a seven.')).toMatchObject({
            kind: 'parse-error',
            reason: 'the response was not valid JSON',
        });
    });

    it('reports JSON without a numeric score', () => {
        expect(parseGradingResponse('{"score": "excellent", "feedback": "Great"}')).toMatchObject({
            kind: 'parse-error',
            reason: 'the response did not contain a numeric score',
        });
        expect(parseGradingResponse('{"feedback": "Great"}')).toMatchObject({
            kind: 'parse-error',
            reason: 'the response did not contain a numeric score',
        });
    });
});

describe('gradeAnswers', () => {
    it('grades only the questions present on both sides, in answer key order', async () => {
        const { model, generate } = fakeModel();
        generate
            .mockResolvedValueOnce('{"score": 9, "feedback": "Good definition."}')
            .mockResolvedValueOnce('{"score": 4, "feedback": "Incomplete."}');

        const teacher = answers([['1', 'Osmosis'], ['2', 'Inertia'], ['3', 'Photosynthesis']]);
        const student = answers([['3', 'Plants make food'], ['1', 'Water moves'], ['4', 'Extra']]);

        const results = await gradeAnswers(teacher, student, model);

        expect(results).toEqual([
            {
                id: '1',
                score: 9,
                feedback: 'Good definition.',
                status: 'graded',
                referenceAnswer: 'Osmosis',
                studentAnswer: 'Water moves',
            },
            {
                id: '3',
                score: 4,
                feedback: 'Incomplete.',
                status: 'graded',
                referenceAnswer: 'Photosynthesis',
                studentAnswer: 'Plants make food',
            },
        ]);
        expect(generate).toHaveBeenCalledTimes(2);
    });

    it('sends a structured grading request', async () => {
        const { model, generate } = fakeModel();
        generate.mockResolvedValue('{"score": 0, "feedback": "Blank."}');

        await gradeAnswers(answers([['2', 'Reference']]), answers([['2', '']]), model);

        const request = generate.mock.calls[0][0];
        expect(request.purpose).toBe('grading');
        expect(request.responseSchema).toBeDefined();
        expect(request.prompt).toContain('Question: 2');
        expect(request.prompt).toContain('(no answer written)');
    });

    it('scores an unreadable reply as zero with an explanation', async () => {
        const { model, generate } = fakeModel();
        generate.mockResolvedValue('Seven out of ten.');

        const [result] = await gradeAnswers(answers([['1', 'a']]), answers([['1', 'b']]), model);

        expect(result).toMatchObject({
            id: '1',
            score: 0,
            status: 'parse-failure',
            feedback: 'This answer could not be scored because the response was not valid JSON.',
        });
    });

    it('scores a failed request as zero and keeps grading', async () => {
        const { model, generate } = fakeModel();
        generate
            .mockRejectedValueOnce(new Error('timeout'))
            .mockResolvedValueOnce('{"score": 6, "feedback": "Fine."}');

        const results = await gradeAnswers(answers([['1', 'a'], ['2', 'b']]), answers([['1', 'x'], ['2', 'y']]), model);

        expect(results[0]).toMatchObject({
            score: 0,
            status: 'request-failure',
            feedback: 'This answer could not be scored because the grading request failed (timeout).',
        });
        expect(results[1]).toMatchObject({ id: '2', score: 6, status: 'graded' });
    });

    it('rejects on a fatal model error instead of scoring zero', async () => {
        const { model, generate } = fakeModel();
        generate.mockRejectedValue(new ModelRequestError('API key not valid', true));

        await expect(gradeAnswers(answers([['1', 'a']]), answers([['1', 'b']]), model)).rejects.toMatchObject({
            fatal: true,
            message: 'API key not valid',
        });
    });

    it('keeps answer key order when questions are graded concurrently', async () => {
        const delays: Record<string, number> = { '1': 30, '2': 20, '3': 5 };
        const generate = vi.fn(async (request: ModelRequest) => {
            const id = /Question: (\S+)/.exec(request.prompt)?.[1] ?? '';
            await new Promise((resolve) => setTimeout(resolve, delays[id] ?? 0));
            return `{"score": ${Number(id) + 1}, "feedback": "q${id}"}`;
        });

        const set = answers([['1', 'a'], ['2', 'b'], ['3', 'c']]);
        const results = await gradeAnswers(set, set, { generate }, { concurrency: 3 });

        expect(results.map((result) => [result.id, result.score, result.feedback])).toEqual([
            ['1', 2, 'q1'],
            ['2', 3, 'q2'],
            ['3', 4, 'q3'],
        ]);
    });

    it('returns nothing when no question ids match', async () => {
        const { model, generate } = fakeModel();

        const results = await gradeAnswers(answers([['full text', 'Explain photosynthesis.']]), answers([['1', 'x']]), model);

        expect(results).toEqual([]);
        expect(generate).not.toHaveBeenCalled();
    });

    it('grades a whole-text key against a whole-text script as one question', async () => {
        const { model, generate } = fakeModel();
        generate.mockResolvedValue('{"score": 8, "feedback": "Good."}');

        const results = await gradeAnswers(
            answers([['full text', 'Explain photosynthesis.']]),
            answers([['full text', 'Plants use light to make sugar.']]),
            model,
        );

        expect(results).toHaveLength(1);
        expect(results[0]).toMatchObject({ id: 'full text', score: 8 });
    });
});
