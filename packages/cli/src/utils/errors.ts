/**
 * Helpers for values caught from Node's fs APIs.
 */

export function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
