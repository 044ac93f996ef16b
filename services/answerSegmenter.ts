import type { AnswerSet } from '../types.js';

/** Key of the single entry produced when the text carries no question numbering. */
export const FULL_TEXT_ID = 'full text';

// "1.", "2)", "3:", "4 -", "Q5.", "Question 6)", "2a." at the start of a line.
// The delimiter may not be followed by a digit so "3.5 kg" is not a marker.
const MARKER_PATTERN = /^[ \t]*(?:Q(?:uestion)?[ \t]*)?(\d+[a-z]?)[ \t]*[.):-](?!\d)[ \t]*/gim;

/**
 * Splits text into answers keyed by question number, in document order. A number
 * seen twice keeps its first position but takes the later text.
 */
export function segmentAnswers(text: string): AnswerSet {
    const markers = [...text.matchAll(MARKER_PATTERN)];
    const answers: AnswerSet = new Map();

    if (markers.length === 0) {
        console.warn('[segmenter] no question numbering found, grading the whole text as one answer');
        answers.set(FULL_TEXT_ID, text.trim());
        return answers;
    }

    markers.forEach((marker, index) => {
        const start = (marker.index ?? 0) + marker[0].length;
        const next = markers[index + 1];
        const end = next ? next.index ?? text.length : text.length;
        answers.set(marker[1].toLowerCase(), text.slice(start, end).trim());
    });

    return answers;
}

export const isWholeTextFallback = (answers: AnswerSet) => answers.size === 1 && answers.has(FULL_TEXT_ID);
