/**
 * Raised when an inbound payload, sample or setting fails validation.
 * Never fatal: callers turn it into a failure reply or a 400.
 */
export class ValidationError extends Error {
    public readonly field?: string;

    constructor(message: string, field?: string) {
        super(message);
        this.name = 'ValidationError';
        this.field = field;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
