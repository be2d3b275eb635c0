import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { HistoryClient, HistoryQuery, TradesQuery } from '@/clients/types';
import { historyItemSchema, tradeSchema, type HistoryItem, type Trade } from '@/clients/schemas';
import { parseResponse, toDownstreamError } from '@/lib/http-client';

const SERVICE = 'history-service';

const historyListSchema = z.array(historyItemSchema);
const tradeListSchema = z.array(tradeSchema);

export class HttpHistoryClient implements HistoryClient {
    constructor(private readonly http: AxiosInstance) {}

    async getHistoryByWallet(walletId: string, query: HistoryQuery): Promise<HistoryItem[]> {
        try {
            const { data } = await this.http.get<unknown>(`/api/history/wallet/${encodeURIComponent(walletId)}`, {
                params: {
                    type: query.types,
                    assetId: query.assetId,
                    assetPairId: query.assetPairId,
                    offset: query.offset,
                    limit: query.limit,
                    from: query.from?.toISOString(),
                    to: query.to?.toISOString()
                },
                paramsSerializer: { indexes: null }
            });
            return parseResponse(historyListSchema, data, SERVICE);
        } catch (error: unknown) {
            throw toDownstreamError(SERVICE, 'getHistoryByWallet', error);
        }
    }

    async getTradesByWallet(walletId: string, query: TradesQuery): Promise<Trade[]> {
        try {
            const { data } = await this.http.get<unknown>(`/api/trades/wallet/${encodeURIComponent(walletId)}`, {
                params: {
                    assetPairId: query.assetPairId,
                    tradeType: query.tradeType,
                    offset: query.offset,
                    limit: query.limit,
                    from: query.from?.toISOString(),
                    to: query.to?.toISOString()
                }
            });
            return parseResponse(tradeListSchema, data, SERVICE);
        } catch (error: unknown) {
            throw toDownstreamError(SERVICE, 'getTradesByWallet', error);
        }
    }
}
