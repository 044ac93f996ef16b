import { z } from 'zod';
import { GraderError, fail, ok, type Result } from './errors.js';

export const DEFAULT_MODEL = 'gemini-2.5-flash';

const ConfigSchema = z.object({
    apiKey: z.string().optional(),
    gradingModel: z.string().min(1).default(DEFAULT_MODEL),
    ocrModel: z.string().min(1).optional(),
    resultsDir: z.string().min(1).default('results'),
    concurrency: z.coerce.number().int().min(1).max(16).default(1),
    maxScriptsPerBatch: z.coerce.number().int().min(1).default(30),
    pdfRenderDpi: z.coerce.number().int().min(72).max(600).default(200),
});

export interface GraderConfig {
    apiKey?: string;
    gradingModel: string;
    ocrModel: string;
    resultsDir: string;
    concurrency: number;
    maxScriptsPerBatch: number;
    pdfRenderDpi: number;
}

const blankToUndefined = (value: string | undefined) =>
    value === undefined || value.trim() === '' ? undefined : value.trim();

/**
 * Reads the grader settings from environment variables. The API key may come from
 * GEMINI_API_KEY, GOOGLE_API_KEY or API_KEY, in that order.
 */
export function loadConfig(env: NodeJS.ProcessEnv): Result<GraderConfig> {
    const parsed = ConfigSchema.safeParse({
        apiKey: blankToUndefined(env.GEMINI_API_KEY) ?? blankToUndefined(env.GOOGLE_API_KEY) ?? blankToUndefined(env.API_KEY),
        gradingModel: blankToUndefined(env.GRADER_MODEL),
        ocrModel: blankToUndefined(env.OCR_MODEL),
        resultsDir: blankToUndefined(env.RESULTS_DIR),
        concurrency: blankToUndefined(env.GRADING_CONCURRENCY),
        maxScriptsPerBatch: blankToUndefined(env.MAX_SCRIPTS_PER_BATCH),
        pdfRenderDpi: blankToUndefined(env.PDF_RENDER_DPI),
    });

    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        return fail(new GraderError('ConfigurationError', `Invalid configuration (${details})`));
    }

    const { ocrModel, ...rest } = parsed.data;
    return ok({ ...rest, ocrModel: ocrModel ?? rest.gradingModel });
}

export function requireApiKey(config: GraderConfig): Result<string> {
    if (!config.apiKey) {
        return fail(new GraderError(
            'ConfigurationError',
            'No API key found. Set GEMINI_API_KEY (or GOOGLE_API_KEY) in the environment or a .env file.',
        ));
    }
    return ok(config.apiKey);
}
