import type { AxiosInstance } from 'axios';
import type { Principal, PrincipalContext, PrincipalProvider } from '@/auth/types';
import { sessionSchema } from '@/clients/schemas';
import { AUTH } from '@/constants';
import { isNotFound, parseResponse, toDownstreamError } from '@/lib/http-client';

const SERVICE = 'session-service';

/** Resolves internal session tokens to the client that owns the session. */
export class HttpSessionPrincipalProvider implements PrincipalProvider {
    constructor(private readonly http: AxiosInstance) {}

    async getCurrentPrincipal(context: PrincipalContext): Promise<Principal | null> {
        try {
            const { data } = await this.http.post<unknown>(
                '/api/sessions/lookup',
                { sessionToken: context.token },
                { signal: context.signal }
            );
            const session = parseResponse(sessionSchema, data, SERVICE);

            return {
                clientId: session.clientId,
                scheme: AUTH.SCHEME,
                claims: {
                    sub: session.clientId,
                    ...(session.partnerId ? { partner_id: session.partnerId } : {})
                }
            };
        } catch (error: unknown) {
            if (isNotFound(error)) return null;
            throw toDownstreamError(SERVICE, 'getCurrentPrincipal', error);
        }
    }
}
