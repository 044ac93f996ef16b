import { describeError } from '../errors.js';
import type { QuestionResult } from '../types.js';
import { isFatalModelError, type ModelClient } from './modelClient.js';

export const FEEDBACK_UNAVAILABLE = 'Overall feedback could not be generated for this script.';
export const NO_QUESTIONS_MATCHED =
    'No questions in this script matched the answer key, so there is nothing to summarise.';

export interface OverallFeedbackInput {
    student: string;
    subject: string;
    totalScore: number;
    maxScore: number;
    questions: QuestionResult[];
}

const formatBreakdown = (questions: QuestionResult[]) =>
    questions.map((question) => `- Question ${question.id}: ${question.score}/10. ${question.feedback}`).join('\n');

/**
 * Asks the model for a short, encouraging summary of one graded script.
 * Falls back to a fixed message unless the model error is fatal.
 */
export async function generateOverallFeedback(input: OverallFeedbackInput, model: ModelClient): Promise<string> {
    if (input.questions.length === 0) return NO_QUESTIONS_MATCHED;

    const prompt = `You are an expert teacher. A student named ${input.student} has just completed an exam in ${input.subject}.
Their final score was ${input.totalScore} out of ${input.maxScore}.

Here is the question-by-question breakdown:
${formatBreakdown(input.questions)}

Write a brief overall feedback summary for the student in no more than 3-4 sentences.
Focus on their strengths and one or two key areas for improvement.
Be encouraging and constructive, and address the student directly as "you".`;

    try {
        const text = (await model.generate({ purpose: 'summary', prompt })).trim();
        if (text) return text;
        console.warn(`[feedback] ${input.student}: empty summary response`);
    } catch (error) {
        if (isFatalModelError(error)) throw error;
        console.warn(`[feedback] ${input.student}: ${describeError(error)}`);
    }
    return FEEDBACK_UNAVAILABLE;
}
