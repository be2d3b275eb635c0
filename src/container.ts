import type { AppConfig } from '@/lib/env';
import type { AppDependencies } from '@/app';
import { createHttpClient } from '@/lib/http-client';
import { BearerAuthenticationGate } from '@/auth/bearer-gate';
import { TokenClassifier } from '@/auth/token-classifier';
import { LegacyPrincipalResolver } from '@/auth/legacy-principal-resolver';
import { IntrospectionVerifier } from '@/auth/introspection-verifier';
import { IntrospectionCache } from '@/auth/introspection-cache';
import { HttpIntrospectionClient } from '@/auth/introspection-client';
import { HttpSessionPrincipalProvider } from '@/clients/session.client';
import { HttpAccountClient } from '@/clients/account.client';
import { HttpHistoryClient } from '@/clients/history.client';
import { HttpAssetsClient } from '@/clients/assets.client';
import { HttpExplorerLinkProvider } from '@/clients/explorer.client';

export interface Container extends AppDependencies {
    introspectionCache: IntrospectionCache;
}

/** Builds every long-lived component once; request handlers share them by reference. */
export const createContainer = (config: AppConfig): Container => {
    const { auth, services } = config;

    const introspectionCache = new IntrospectionCache({ maxEntries: auth.cache.maxEntries });

    const gate = new BearerAuthenticationGate({
        classifier: new TokenClassifier(auth.internalTokenLength),
        legacyResolver: new LegacyPrincipalResolver(
            new HttpSessionPrincipalProvider(createHttpClient(services.sessionUrl, services.timeoutMs))
        ),
        verifier: new IntrospectionVerifier(
            new HttpIntrospectionClient({ ...auth.introspection, timeoutMs: services.timeoutMs }),
            introspectionCache,
            { cacheTtlSeconds: auth.cache.ttlSeconds }
        )
    });

    return {
        introspectionCache,
        authHandlers: [gate],
        clients: {
            accounts: new HttpAccountClient(createHttpClient(services.accountUrl, services.timeoutMs)),
            history: new HttpHistoryClient(createHttpClient(services.historyUrl, services.timeoutMs)),
            assets: new HttpAssetsClient(createHttpClient(services.assetsUrl, services.timeoutMs)),
            explorers: new HttpExplorerLinkProvider(createHttpClient(services.explorerUrl, services.timeoutMs))
        }
    };
};
