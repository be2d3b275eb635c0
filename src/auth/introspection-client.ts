import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { IntrospectionError } from '@/errors/app-error';
import type { IntrospectionResult, TokenIntrospectionClient } from '@/auth/types';
import logger from '@/lib/logger';

// RFC 7662 only guarantees `active`; every other member is a claim.
const introspectionResponseSchema = z.looseObject({
    active: z.boolean()
});

export interface IntrospectionClientOptions {
    endpoint: string;
    clientId: string;
    clientSecret: string;
    timeoutMs: number;
}

export class HttpIntrospectionClient implements TokenIntrospectionClient {
    private readonly http: AxiosInstance;

    constructor(private readonly options: IntrospectionClientOptions, http?: AxiosInstance) {
        this.http = http ?? axios.create({ timeout: options.timeoutMs });
    }

    async introspect(token: string, signal?: AbortSignal): Promise<IntrospectionResult> {
        const body = new URLSearchParams({ token, token_type_hint: 'access_token' });
        const startTime = Date.now();

        let payload: unknown;
        try {
            const response = await this.http.post<unknown>(this.options.endpoint, body.toString(), {
                headers: {
                    'Content-Type': 'application/x-www-form-urlencoded',
                    Accept: 'application/json'
                },
                auth: {
                    username: this.options.clientId,
                    password: this.options.clientSecret
                },
                signal
            });
            payload = response.data;
        } catch (error: unknown) {
            const status = axios.isAxiosError(error) ? error.response?.status : undefined;
            const message = error instanceof Error ? error.message : String(error);
            throw new IntrospectionError('Token introspection request failed', { status, error: message });
        }

        const parsed = introspectionResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new IntrospectionError('Invalid introspection response', {
                issues: parsed.error.issues.map((issue) => issue.message)
            });
        }

        const { active, ...claims } = parsed.data;

        logger.debug('Token introspected', { active, durationMs: Date.now() - startTime });
        return { active, claims };
    }
}
