/**
 * Any failure of the profile store: I/O, malformed JSON or an invalid document.
 * Callers surface the message and abort the action that triggered it.
 */
export class ProfileError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ProfileError";
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
