import type { Schema } from '@google/genai';
import type { PageImage } from '../types.js';

export type ModelPurpose = 'ocr' | 'grading' | 'summary';

export interface ModelRequest {
    purpose: ModelPurpose;
    prompt: string;
    images?: PageImage[];
    systemInstruction?: string;
    responseSchema?: Schema;
}

/**
 * The text/vision completion capability the grader depends on. Implementations
 * return the raw response text and throw {@link ModelRequestError} on failure.
 */
export interface ModelClient {
    generate(request: ModelRequest): Promise<string>;
}

export class ModelRequestError extends Error {
    /** Set when retrying with another page or question cannot succeed either, e.g. a rejected API key. */
    readonly fatal: boolean;

    constructor(message: string, fatal: boolean, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ModelRequestError';
        this.fatal = fatal;
    }
}

export const isFatalModelError = (error: unknown): error is ModelRequestError =>
    error instanceof ModelRequestError && error.fatal;
