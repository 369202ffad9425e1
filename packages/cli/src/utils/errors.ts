/**
 * Message of a caught value, whether or not it is an Error.
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
