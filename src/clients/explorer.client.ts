import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { ExplorerLinkProvider } from '@/clients/types';
import { explorerLinkSchema, type ExplorerLink } from '@/clients/schemas';
import { isNotFound, parseResponse, toDownstreamError } from '@/lib/http-client';

const SERVICE = 'explorer-service';

const explorerLinkListSchema = z.array(explorerLinkSchema);

export class HttpExplorerLinkProvider implements ExplorerLinkProvider {
    constructor(private readonly http: AxiosInstance) {}

    async getLinks(blockchainType: string, transactionHash: string): Promise<ExplorerLink[]> {
        try {
            const { data } = await this.http.get<unknown>(
                `/api/explorers/${encodeURIComponent(blockchainType)}/${encodeURIComponent(transactionHash)}`
            );
            return parseResponse(explorerLinkListSchema, data, SERVICE);
        } catch (error: unknown) {
            // No explorer configured for this blockchain
            if (isNotFound(error)) return [];
            throw toDownstreamError(SERVICE, 'getLinks', error);
        }
    }
}
