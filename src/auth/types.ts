export interface Principal {
    clientId: string;
    scheme: string;
    claims: Readonly<Record<string, unknown>>;
}

export type AuthenticationOutcome =
    | { kind: 'success'; principal: Principal; scheme: string }
    | { kind: 'no-result' }
    | { kind: 'failure'; reason: string };

/** What an authentication handler sees of the inbound request. */
export interface AuthenticationRequest {
    authorization?: string;
    requestId?: string;
    signal?: AbortSignal;
}

/** Context handed to a principal provider once a legacy token has been recognised. */
export interface PrincipalContext extends AuthenticationRequest {
    token: string;
}

export interface AuthenticationHandler {
    readonly name: string;
    authenticate(request: AuthenticationRequest): Promise<AuthenticationOutcome>;
}

export interface PrincipalProvider {
    getCurrentPrincipal(context: PrincipalContext): Promise<Principal | null>;
}

export interface IntrospectionResult {
    active: boolean;
    claims: Readonly<Record<string, unknown>>;
}

export interface TokenIntrospectionClient {
    introspect(token: string, signal?: AbortSignal): Promise<IntrospectionResult>;
}
