
export type DocumentRole = 'answer-key' | 'student-script';

export type ContentStyle = 'typed' | 'handwritten';

export type SourceFormat = 'pdf' | 'image' | 'docx' | 'text';

export interface UploadedFile {
    name: string;
    data: Uint8Array;
    mimeType?: string;
}

export interface PageImage {
    pageNumber: number;
    mimeType: string;
    data: Uint8Array;
}

export type LoadedDocument =
    | { kind: 'text'; name: string; format: 'docx' | 'text'; text: string }
    | { kind: 'image'; name: string; format: 'pdf' | 'image'; pages: PageImage[] };

export interface ExtractedText {
    text: string;
    pageCount: number;
    failedPages: number[];
}

/** Question id to answer text, in document order. */
export type AnswerSet = Map<string, string>;

export type QuestionStatus = 'graded' | 'parse-failure' | 'request-failure';

export interface QuestionResult {
    id: string;
    score: number;
    feedback: string;
    status: QuestionStatus;
    referenceAnswer: string;
    studentAnswer: string;
}

export interface GradingSession {
    student: string;
    subject: string;
    questions: QuestionResult[];
    totalScore: number;
    maxScore: number;
    averageScore: number;
    percentage: number;
    overallFeedback: string;
    gradedAt: string;
}

export type GradingOutcome =
    | { kind: 'ok'; score: number; feedback: string }
    | { kind: 'parse-error'; raw: string; reason: string };
