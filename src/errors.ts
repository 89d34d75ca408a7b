// errors.ts

/** The image payload is malformed or not decodable. Fatal to the request. */
export class DecodeError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DecodeError';
    }
}

/** The OCR engine failed. Recovered inside the text analyzer. */
export class RecognitionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RecognitionError';
    }
}

/** Saving an analysis failed. Logged and swallowed at the service boundary. */
export class PersistenceError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PersistenceError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
