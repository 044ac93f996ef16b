import mammoth from 'mammoth';
import { GraderError, describeError, fail, ok, type Result } from '../errors.js';
import type { DocumentRole, LoadedDocument, UploadedFile } from '../types.js';
import { detectFormat } from '../utils/fileUtils.js';
import { DEFAULT_RENDER_DPI, rasterizePdf, type PdfRasterizer } from '../utils/pdfUtils.js';

export type DocxTextExtractor = (data: Uint8Array) => Promise<string>;

export interface DocumentLoaderOptions {
    renderDpi?: number;
    rasterize?: PdfRasterizer;
    extractDocxText?: DocxTextExtractor;
}

const extractDocxText: DocxTextExtractor = async (data) => {
    const { value } = await mammoth.extractRawText({ buffer: Buffer.from(data) });
    return value;
};

const decodeUtf8 = (data: Uint8Array) => new TextDecoder('utf-8', { fatal: true }).decode(data);

/**
 * Turns an uploaded file into either text (answer keys in DOCX or plain text) or a
 * list of page images ready for OCR (PDFs and PNG/JPEG scans).
 */
export async function loadDocument(
    file: UploadedFile,
    role: DocumentRole,
    options: DocumentLoaderOptions = {},
): Promise<Result<LoadedDocument>> {
    const detected = detectFormat(file.name, file.data, file.mimeType);
    if (!detected.ok) return detected;

    const { format, mimeType } = detected.value;

    if ((format === 'docx' || format === 'text') && role === 'student-script') {
        return fail(new GraderError(
            'UnsupportedFormat',
            `${file.name}: student scripts must be a PDF or an image (PNG/JPG).`,
        ));
    }

    switch (format) {
        case 'image':
            return ok({
                kind: 'image',
                name: file.name,
                format,
                pages: [{ pageNumber: 1, mimeType, data: file.data }],
            });

        case 'pdf': {
            const rasterize = options.rasterize ?? rasterizePdf;
            try {
                const pages = await rasterize(file.data, options.renderDpi ?? DEFAULT_RENDER_DPI);
                if (pages.length === 0) {
                    return fail(new GraderError('CorruptDocument', `${file.name} has no pages.`));
                }
                return ok({ kind: 'image', name: file.name, format, pages });
            } catch (error) {
                return fail(new GraderError(
                    'CorruptDocument',
                    `${file.name} could not be read as a PDF: ${describeError(error)}`,
                    { cause: error },
                ));
            }
        }

        case 'docx': {
            const extract = options.extractDocxText ?? extractDocxText;
            try {
                return ok({ kind: 'text', name: file.name, format, text: await extract(file.data) });
            } catch (error) {
                return fail(new GraderError(
                    'CorruptDocument',
                    `${file.name} could not be read as a Word document: ${describeError(error)}`,
                    { cause: error },
                ));
            }
        }

        case 'text':
            try {
                return ok({ kind: 'text', name: file.name, format, text: decodeUtf8(file.data) });
            } catch (error) {
                return fail(new GraderError('CorruptDocument', `${file.name} is not valid UTF-8 text.`, { cause: error }));
            }
    }
}
