import { createCanvas } from '@napi-rs/canvas';
import { getDocument, type PDFPageProxy } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PageImage } from '../types.js';

export const DEFAULT_RENDER_DPI = 200;

const PDF_POINTS_PER_INCH = 72;
const JPEG_QUALITY = 85;

type RenderParameters = Parameters<PDFPageProxy['render']>[0];

export type PdfRasterizer = (data: Uint8Array, dpi: number) => Promise<PageImage[]>;

/**
 * Renders every page of a PDF to a JPEG at the given resolution, in page order.
 * Throws when the PDF cannot be parsed or a page cannot be rendered.
 */
export const rasterizePdf: PdfRasterizer = async (data, dpi) => {
    // pdf.js transfers the buffer it is given to its worker, so hand it a copy
    const pdf = await getDocument({ data: new Uint8Array(data), isEvalSupported: false }).promise;
    const scale = dpi / PDF_POINTS_PER_INCH;
    const pages: PageImage[] = [];

    try {
        for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
            const page = await pdf.getPage(pageNumber);
            const viewport = page.getViewport({ scale });
            const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
            const context = canvas.getContext('2d');

            // The node canvas context is not the DOM CanvasRenderingContext2D the pdf.js
            // typings expect, although pdf.js draws on it the same way
            await page.render({ canvasContext: context, viewport } as unknown as RenderParameters).promise;

            const jpeg = await canvas.encode('jpeg', JPEG_QUALITY);
            pages.push({ pageNumber, mimeType: 'image/jpeg', data: new Uint8Array(jpeg) });
            page.cleanup();
        }
    } finally {
        await pdf.destroy();
    }

    return pages;
};
