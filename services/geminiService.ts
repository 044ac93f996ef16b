import { ApiError, GoogleGenAI, type Part } from '@google/genai';
import { describeError } from '../errors.js';
import { toGenerativePart } from '../utils/fileUtils.js';
import { ModelRequestError, type ModelClient, type ModelRequest } from './modelClient.js';

export interface GeminiClientOptions {
    apiKey: string;
    gradingModel: string;
    ocrModel: string;
}

export interface ModelInfo {
    name: string;
    displayName?: string;
}

const isAuthFailure = (error: ApiError) =>
    error.status === 401 ||
    error.status === 403 ||
    (error.status === 400 && /api key/i.test(error.message));

export class GeminiModelClient implements ModelClient {
    private readonly ai: GoogleGenAI;

    constructor(private readonly options: GeminiClientOptions) {
        this.ai = new GoogleGenAI({ apiKey: options.apiKey });
    }

    async generate(request: ModelRequest): Promise<string> {
        const model = request.purpose === 'ocr' ? this.options.ocrModel : this.options.gradingModel;
        const parts: Part[] = [
            ...(request.images ?? []).map(toGenerativePart),
            { text: request.prompt },
        ];

        try {
            const response = await this.ai.models.generateContent({
                model,
                contents: { parts },
                config: {
                    systemInstruction: request.systemInstruction,
                    ...(request.responseSchema
                        ? { responseMimeType: 'application/json', responseSchema: request.responseSchema }
                        : {}),
                    temperature: request.purpose === 'grading' ? 0.2 : undefined,
                },
            });
            return response.text ?? '';
        } catch (error) {
            if (error instanceof ApiError) {
                throw new ModelRequestError(
                    `Gemini ${request.purpose} request failed (${error.status}): ${error.message}`,
                    isAuthFailure(error),
                    { cause: error },
                );
            }
            throw new ModelRequestError(
                `Gemini ${request.purpose} request failed: ${describeError(error)}`,
                false,
                { cause: error },
            );
        }
    }

    /** Models the key can use for generateContent. */
    async listModels(): Promise<ModelInfo[]> {
        const models: ModelInfo[] = [];
        try {
            const pager = await this.ai.models.list();
            for await (const model of pager) {
                if (!model.name) continue;
                const actions = model.supportedActions ?? [];
                if (actions.length > 0 && !actions.includes('generateContent')) continue;
                models.push({ name: model.name, displayName: model.displayName });
            }
        } catch (error) {
            throw new ModelRequestError(
                `Could not list Gemini models: ${describeError(error)}`,
                error instanceof ApiError && isAuthFailure(error),
                { cause: error },
            );
        }
        return models;
    }
}
