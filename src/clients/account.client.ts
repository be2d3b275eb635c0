import type { AxiosInstance } from 'axios';
import type { AccountClient } from '@/clients/types';
import { walletSchema, type Wallet } from '@/clients/schemas';
import { isNotFound, parseResponse, toDownstreamError } from '@/lib/http-client';

const SERVICE = 'account-service';

export class HttpAccountClient implements AccountClient {
    constructor(private readonly http: AxiosInstance) {}

    async getWallet(walletId: string): Promise<Wallet | null> {
        try {
            const { data } = await this.http.get<unknown>(`/api/wallets/${encodeURIComponent(walletId)}`);
            return parseResponse(walletSchema, data, SERVICE);
        } catch (error: unknown) {
            if (isNotFound(error)) return null;
            throw toDownstreamError(SERVICE, 'getWallet', error);
        }
    }
}
