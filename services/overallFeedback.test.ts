import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { QuestionResult } from '../types.js';
import { ModelRequestError, type ModelClient } from './modelClient.js';
import { FEEDBACK_UNAVAILABLE, NO_QUESTIONS_MATCHED, generateOverallFeedback } from './overallFeedback.js';

const question: QuestionResult = {
    id: '1',
    score: 6,
    feedback: 'Missing the membrane.',
    status: 'graded',
    referenceAnswer: 'Osmosis',
    studentAnswer: 'Water moves',
};

const input = { student: 'alice', subject: 'Biology', totalScore: 6, maxScore: 10, questions: [question] };

beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
});

describe('generateOverallFeedback', () => {
    it('summarises the breakdown with the model', async () => {
        const generate = vi.fn<ModelClient['generate']>().mockResolvedValue('  You understand the idea.  ');

        await expect(generateOverallFeedback(input, { generate })).resolves.toBe('You understand the idea.');

        const request = generate.mock.calls[0][0];
        expect(request.purpose).toBe('summary');
        expect(request.prompt).toContain('Their final score was 6 out of 10.');
        expect(request.prompt).toContain('- Question 1: 6/10. Missing the membrane.');
    });

    it('does not call the model when nothing was graded', async () => {
        const generate = vi.fn<ModelClient['generate']>();

        await expect(generateOverallFeedback({ ...input, questions: [] }, { generate })).resolves.toBe(NO_QUESTIONS_MATCHED);
        expect(generate).not.toHaveBeenCalled();
    });

    it('falls back when the model fails or says nothing', async () => {
        const failing = vi.fn<ModelClient['generate']>().mockRejectedValue(new Error('quota exceeded'));
        const silent = vi.fn<ModelClient['generate']>().mockResolvedValue('');

        await expect(generateOverallFeedback(input, { generate: failing })).resolves.toBe(FEEDBACK_UNAVAILABLE);
        await expect(generateOverallFeedback(input, { generate: silent })).resolves.toBe(FEEDBACK_UNAVAILABLE);
    });

    it('rethrows a fatal model error', async () => {
        const generate = vi.fn<ModelClient['generate']>().mockRejectedValue(new ModelRequestError('API key not valid', true));

        await expect(generateOverallFeedback(input, { generate })).rejects.toBeInstanceOf(ModelRequestError);
    });
});
