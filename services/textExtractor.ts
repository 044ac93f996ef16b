import { GraderError, describeError, fail, ok, type Result } from '../errors.js';
import type { ContentStyle, ExtractedText, LoadedDocument } from '../types.js';
import { isFatalModelError, type ModelClient } from './modelClient.js';

const OCR_PROMPTS: Record<ContentStyle, string> = {
    typed: `Extract all typed text from this page exactly as it appears.
Keep question numbers (for example "1.", "2)", "Q3:") at the start of their lines and preserve line breaks.
Return only the text, with no commentary or formatting.`,
    handwritten: `Transcribe all handwritten text on this page of a student's answer script.
Keep question numbers (for example "1.", "2)", "Q3:") at the start of their lines and preserve line breaks.
Write unreadable words as [illegible]. Return only the transcription, with no commentary or formatting.`,
};

/**
 * Produces the text of a document. Text documents pass through; page images are
 * sent one at a time to the model and joined in page order. A page that fails or
 * comes back empty contributes an empty line, unless the failure is fatal or no
 * page succeeds at all.
 */
export async function extractText(
    document: LoadedDocument,
    model: ModelClient,
    style: ContentStyle,
): Promise<Result<ExtractedText>> {
    if (document.kind === 'text') {
        return ok({ text: document.text, pageCount: 1, failedPages: [] });
    }

    const texts: string[] = [];
    const failedPages: number[] = [];

    for (const page of document.pages) {
        try {
            const text = (await model.generate({ purpose: 'ocr', prompt: OCR_PROMPTS[style], images: [page] })).trim();
            if (!text) {
                console.warn(`[ocr] ${document.name} page ${page.pageNumber}: empty response`);
                failedPages.push(page.pageNumber);
            }
            texts.push(text);
        } catch (error) {
            if (isFatalModelError(error)) {
                return fail(new GraderError(
                    'ExtractionFailure',
                    `Text extraction for ${document.name} failed: ${error.message}`,
                    { cause: error },
                ));
            }
            console.warn(`[ocr] ${document.name} page ${page.pageNumber}: ${describeError(error)}`);
            failedPages.push(page.pageNumber);
            texts.push('');
        }
    }

    if (failedPages.length === document.pages.length) {
        return fail(new GraderError(
            'ExtractionFailure',
            `No text could be extracted from any page of ${document.name}.`,
        ));
    }

    return ok({ text: texts.join('\n'), pageCount: document.pages.length, failedPages });
}
