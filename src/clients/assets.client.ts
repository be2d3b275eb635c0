import type { AxiosInstance } from 'axios';
import type { AssetsClient } from '@/clients/types';
import { assetSchema, type Asset } from '@/clients/schemas';
import { isNotFound, parseResponse, toDownstreamError } from '@/lib/http-client';

const SERVICE = 'assets-service';

export class HttpAssetsClient implements AssetsClient {
    constructor(private readonly http: AxiosInstance) {}

    async getAsset(assetId: string): Promise<Asset | null> {
        try {
            const { data } = await this.http.get<unknown>(`/api/assets/${encodeURIComponent(assetId)}`);
            return parseResponse(assetSchema, data, SERVICE);
        } catch (error: unknown) {
            if (isNotFound(error)) return null;
            throw toDownstreamError(SERVICE, 'getAsset', error);
        }
    }
}
