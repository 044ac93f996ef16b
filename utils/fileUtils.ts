import path from 'node:path';
import type { Part } from '@google/genai';
import { GraderError, fail, ok, type Result } from '../errors.js';
import type { PageImage, SourceFormat } from '../types.js';

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-
const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_MAGIC = [0xff, 0xd8, 0xff];
const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04];

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export interface DetectedFormat {
    format: SourceFormat;
    mimeType: string;
}

const startsWith = (data: Uint8Array, magic: number[]) =>
    data.length >= magic.length && magic.every((byte, index) => data[index] === byte);

type DeclaredFormat = 'pdf' | 'png' | 'jpeg' | 'docx' | 'doc' | 'text' | 'unknown';

function declaredFormat(fileName: string, mimeType?: string): DeclaredFormat {
    const extension = path.extname(fileName).toLowerCase();
    const mime = (mimeType ?? '').toLowerCase();

    if (extension === '.pdf' || mime === 'application/pdf') return 'pdf';
    if (extension === '.png' || mime === 'image/png') return 'png';
    if (extension === '.jpg' || extension === '.jpeg' || mime === 'image/jpeg' || mime === 'image/jpg') return 'jpeg';
    if (extension === '.docx' || mime === DOCX_MIME) return 'docx';
    if (extension === '.doc' || mime === 'application/msword') return 'doc';
    if (extension === '.txt' || extension === '.md' || mime.startsWith('text/')) return 'text';
    return 'unknown';
}

/**
 * Works out what kind of document a file holds. Magic bytes win over the declared
 * name and MIME type; a declared binary format whose bytes do not match is treated
 * as corrupt rather than unsupported.
 */
export function detectFormat(fileName: string, data: Uint8Array, mimeType?: string): Result<DetectedFormat> {
    if (data.length === 0) {
        return fail(new GraderError('CorruptDocument', `${fileName} is empty.`));
    }

    if (startsWith(data, PDF_MAGIC)) return ok({ format: 'pdf', mimeType: 'application/pdf' });
    if (startsWith(data, PNG_MAGIC)) return ok({ format: 'image', mimeType: 'image/png' });
    if (startsWith(data, JPEG_MAGIC)) return ok({ format: 'image', mimeType: 'image/jpeg' });

    const declared = declaredFormat(fileName, mimeType);

    if (startsWith(data, ZIP_MAGIC)) {
        if (declared === 'docx') return ok({ format: 'docx', mimeType: DOCX_MIME });
        return fail(new GraderError('UnsupportedFormat', `${fileName} is an archive, not a supported document.`));
    }

    switch (declared) {
        case 'pdf':
        case 'png':
        case 'jpeg':
        case 'docx':
            return fail(new GraderError(
                'CorruptDocument',
                `${fileName} does not look like a valid ${declared.toUpperCase()} file.`,
            ));
        case 'text':
            return ok({ format: 'text', mimeType: 'text/plain' });
        case 'doc':
            return fail(new GraderError(
                'UnsupportedFormat',
                `${fileName} is a legacy Word document. Save it as .docx or PDF and try again.`,
            ));
        default:
            return fail(new GraderError('UnsupportedFormat', `${fileName} is not a PDF, PNG, JPEG, DOCX or text file.`));
    }
}

/** The file name without its directory or extension, used as the default student id. */
export const baseName = (fileName: string) => path.basename(fileName, path.extname(fileName));

/**
 * Converts a page image to an inline part for a multimodal prompt.
 */
export function toGenerativePart(page: PageImage): Part {
    return {
        inlineData: {
            mimeType: page.mimeType,
            data: Buffer.from(page.data).toString('base64'),
        },
    };
}
