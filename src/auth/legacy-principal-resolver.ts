import type { AuthenticationOutcome, PrincipalContext, PrincipalProvider } from '@/auth/types';
import { fromPrincipal, noResult } from '@/auth/outcome';
import logger from '@/lib/logger';

/**
 * Resolves internal session tokens through the principal provider. One upstream
 * call per attempt; a provider error leaves the caller unauthenticated.
 */
export class LegacyPrincipalResolver {
    constructor(private readonly provider: PrincipalProvider) {}

    async resolve(context: PrincipalContext): Promise<AuthenticationOutcome> {
        try {
            const principal = await this.provider.getCurrentPrincipal(context);
            if (!principal) {
                logger.debug('Session token did not resolve to a principal', { requestId: context.requestId });
            }
            return fromPrincipal(principal);
        } catch (error: unknown) {
            logger.warn('Principal lookup failed, treating caller as unauthenticated', {
                requestId: context.requestId,
                error: error instanceof Error ? error.message : String(error)
            });
            return noResult();
        }
    }
}
