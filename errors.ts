export type GraderErrorKind =
    | 'UnsupportedFormat'
    | 'CorruptDocument'
    | 'ExtractionFailure'
    | 'ModelFailure'
    | 'PersistenceFailure'
    | 'ConfigurationError'
    | 'InvalidInput';

export class GraderError extends Error {
    readonly kind: GraderErrorKind;

    constructor(kind: GraderErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GraderError';
        this.kind = kind;
    }
}

export type Result<T, E = GraderError> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const fail = <E = GraderError>(error: E): Result<never, E> => ({ ok: false, error });

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
