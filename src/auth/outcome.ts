import type { AuthenticationOutcome, Principal } from '@/auth/types';

export const success = (principal: Principal): AuthenticationOutcome => ({
    kind: 'success',
    principal,
    scheme: principal.scheme
});

export const noResult = (): AuthenticationOutcome => ({ kind: 'no-result' });

export const failure = (reason: string): AuthenticationOutcome => ({ kind: 'failure', reason });

export const fromPrincipal = (principal: Principal | null): AuthenticationOutcome =>
    principal ? success(principal) : noResult();
