import type { AuthenticationHandler, AuthenticationOutcome, AuthenticationRequest } from '@/auth/types';
import { extractBearerToken, TokenClassifier } from '@/auth/token-classifier';
import { LegacyPrincipalResolver } from '@/auth/legacy-principal-resolver';
import { IntrospectionVerifier } from '@/auth/introspection-verifier';
import { noResult } from '@/auth/outcome';
import logger from '@/lib/logger';

export interface BearerGateDependencies {
    classifier: TokenClassifier;
    legacyResolver: LegacyPrincipalResolver;
    verifier: IntrospectionVerifier;
}

/**
 * Bearer authentication with two verification paths chosen by token length:
 * internal session tokens go to the legacy resolver, everything else to
 * token introspection. Never rejects outright; an unverified caller yields
 * `no-result` so later handlers or anonymous access still apply.
 */
export class BearerAuthenticationGate implements AuthenticationHandler {
    readonly name = 'bearer';

    constructor(private readonly deps: BearerGateDependencies) {}

    async authenticate(request: AuthenticationRequest): Promise<AuthenticationOutcome> {
        const token = extractBearerToken(request.authorization);
        if (!token) return noResult();

        const format = this.deps.classifier.classify(token);
        logger.debug('Bearer token presented', { requestId: request.requestId, format });

        if (format === 'internal') {
            return this.deps.legacyResolver.resolve({ ...request, token });
        }

        return this.deps.verifier.verify(token, request.signal);
    }
}
