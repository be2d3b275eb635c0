export type TokenFormat = 'internal' | 'external';

const BEARER_PREFIX = /^bearer\s+/i;

/**
 * Pulls the token out of an `Authorization: Bearer <token>` header value.
 * Any other scheme, or an empty token, counts as no token at all.
 */
export const extractBearerToken = (header: string | undefined): string | null => {
    if (!header || !BEARER_PREFIX.test(header)) return null;

    const token = header.replace(BEARER_PREFIX, '').trim();
    return token.length > 0 ? token : null;
};

export class TokenClassifier {
    constructor(private readonly internalTokenLength: number) {
        if (!Number.isInteger(internalTokenLength) || internalTokenLength <= 0) {
            throw new Error(`Internal token length must be a positive integer, got ${internalTokenLength}`);
        }
    }

    classify(token: string): TokenFormat {
        return token.length === this.internalTokenLength ? 'internal' : 'external';
    }
}
