/**
 * Opaque, server-issued pagination token.
 *
 * The token is never decoded or validated. It is handed back to the same
 * operation verbatim to fetch the next page.
 */
export class ContinuationCursor {
    private constructor(public readonly token: string) { }

    static from(token: string): ContinuationCursor {
        if (!token) {
            throw new Error('Continuation token cannot be empty');
        }
        return new ContinuationCursor(token);
    }

    equals(other: ContinuationCursor | null | undefined): boolean {
        return other != null && other.token === this.token;
    }

    toString(): string {
        return this.token;
    }

    toJSON(): string {
        return this.token;
    }
}
