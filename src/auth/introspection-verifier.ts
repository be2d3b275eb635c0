import type { AuthenticationOutcome, IntrospectionResult, Principal, TokenIntrospectionClient } from '@/auth/types';
import type { IntrospectionCacheStore } from '@/auth/introspection-cache';
import { noResult, success } from '@/auth/outcome';
import { AUTH } from '@/constants';
import logger from '@/lib/logger';

export interface IntrospectionVerifierOptions {
    cacheTtlSeconds: number;
    now?: () => number;
}

export class IntrospectionVerifier {
    private readonly now: () => number;

    constructor(
        private readonly client: TokenIntrospectionClient,
        private readonly cache: IntrospectionCacheStore,
        private readonly options: IntrospectionVerifierOptions
    ) {
        this.now = options.now ?? Date.now;
    }

    async verify(token: string, signal?: AbortSignal): Promise<AuthenticationOutcome> {
        let result = this.readCache(token);

        if (!result) {
            try {
                result = await this.client.introspect(token, signal);
            } catch (error: unknown) {
                logger.warn('Token introspection failed, treating caller as unauthenticated', {
                    error: error instanceof Error ? error.message : String(error)
                });
                return noResult();
            }
            this.writeCache(token, result);
        }

        return this.toOutcome(result);
    }

    private readCache(token: string): IntrospectionResult | undefined {
        try {
            return this.cache.get(token);
        } catch (error: unknown) {
            logger.warn('Introspection cache read failed', {
                error: error instanceof Error ? error.message : String(error)
            });
            return undefined;
        }
    }

    private writeCache(token: string, result: IntrospectionResult): void {
        const ttlSeconds = this.ttlFor(result);
        if (ttlSeconds <= 0) return;

        try {
            this.cache.set(token, result, ttlSeconds);
        } catch (error: unknown) {
            logger.warn('Introspection cache write failed', {
                error: error instanceof Error ? error.message : String(error)
            });
        }
    }

    // An active token is never cached past its own expiry.
    private ttlFor(result: IntrospectionResult): number {
        const { exp } = result.claims;
        if (!result.active || typeof exp !== 'number') {
            return this.options.cacheTtlSeconds;
        }

        const remaining = Math.floor(exp - this.now() / 1000);
        return Math.min(this.options.cacheTtlSeconds, remaining);
    }

    private toOutcome(result: IntrospectionResult): AuthenticationOutcome {
        if (!result.active) return noResult();

        const { sub, client_id: clientId } = result.claims;
        const id = typeof sub === 'string' && sub ? sub : typeof clientId === 'string' && clientId ? clientId : null;

        if (!id) {
            logger.warn('Active token carries neither sub nor client_id');
            return noResult();
        }

        const principal: Principal = { clientId: id, scheme: AUTH.SCHEME, claims: result.claims };
        return success(principal);
    }
}
