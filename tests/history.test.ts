import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '@/app';
import { DownstreamError } from '@/errors/app-error';
import type { AuthenticationHandler } from '@/auth/types';
import type { AccountClient, AssetsClient, ExplorerLinkProvider, HistoryClient } from '@/clients/types';
import type { HistoryItem, Trade, Wallet } from '@/clients/schemas';

const AUTH_HEADER = 'Bearer good-token';

const wallets: Record<string, Wallet> = {
    'w-trading': { id: 'w-trading', clientId: 'client-1', type: 'Trading', name: 'Main' },
    'w-trusted': { id: 'w-trusted', clientId: 'client-1', type: 'Trusted', name: 'API' },
    'w-foreign': { id: 'w-foreign', clientId: 'client-2', type: 'Trusted', name: 'Other' }
};

const historyItem = (id: string, type: HistoryItem['type'], timestamp: string): HistoryItem => ({
    id,
    walletId: 'w-trusted',
    type,
    assetId: 'BTC',
    amount: 1.5,
    state: 'Finished',
    timestamp
});

const trade = (id: string, timestamp: string): Trade => ({
    id,
    walletId: 'w-trusted',
    orderId: `order-${id}`,
    assetPairId: 'BTCUSD',
    baseAssetId: 'BTC',
    baseVolume: 0.5,
    quotingAssetId: 'USD',
    quotingVolume: -20000,
    price: 40000,
    feeSize: 0.001,
    feeAssetId: 'BTC',
    timestamp
});

describe('history routes', () => {
    let app: Express;
    let getWallet: Mock<AccountClient['getWallet']>;
    let getHistoryByWallet: Mock<HistoryClient['getHistoryByWallet']>;
    let getTradesByWallet: Mock<HistoryClient['getTradesByWallet']>;
    let getAsset: Mock<AssetsClient['getAsset']>;
    let getLinks: Mock<ExplorerLinkProvider['getLinks']>;

    beforeEach(() => {
        getWallet = vi.fn<AccountClient['getWallet']>(async (walletId) => wallets[walletId] ?? null);
        getHistoryByWallet = vi.fn<HistoryClient['getHistoryByWallet']>().mockResolvedValue([]);
        getTradesByWallet = vi.fn<HistoryClient['getTradesByWallet']>().mockResolvedValue([]);
        getAsset = vi.fn<AssetsClient['getAsset']>().mockResolvedValue(null);
        getLinks = vi.fn<ExplorerLinkProvider['getLinks']>().mockResolvedValue([]);

        const gate: AuthenticationHandler = {
            name: 'fake',
            authenticate: async ({ authorization }) =>
                authorization === AUTH_HEADER
                    ? {
                        kind: 'success',
                        scheme: 'Bearer',
                        principal: { clientId: 'client-1', scheme: 'Bearer', claims: { sub: 'client-1' } }
                    }
                    : { kind: 'no-result' }
        };

        app = createApp({
            authHandlers: [gate],
            clients: {
                accounts: { getWallet },
                history: { getHistoryByWallet, getTradesByWallet },
                assets: { getAsset },
                explorers: { getLinks }
            }
        });
    });

    describe('pipeline', () => {
        it('should answer health checks without authentication', async () => {
            const res = await request(app).get('/health');

            expect(res.status).toBe(200);
            expect(res.body.status).toBe('OK');
        });

        it('should reject anonymous callers', async () => {
            const res = await request(app).get('/api/history/wallet/w-trusted');

            expect(res.status).toBe(401);
            expect(res.body.error).toBe('Unauthorized');
            expect(getWallet).not.toHaveBeenCalled();
        });

        it('should reject an unrecognised token', async () => {
            const res = await request(app).get('/api/history/wallet/w-trusted').set('Authorization', 'Bearer nope');

            expect(res.status).toBe(401);
        });

        it('should answer 404 for unknown routes', async () => {
            const res = await request(app).get('/nowhere');

            expect(res.status).toBe(404);
            expect(res.body.error).toBe('Route not found');
        });

        it('should echo the request id', async () => {
            const res = await request(app).get('/health').set('X-Request-Id', 'trace-1');

            expect(res.headers['x-request-id']).toBe('trace-1');
            expect(res.body.requestId).toBe('trace-1');
        });
    });

    describe('GET /api/history/wallet/:walletId', () => {
        it('should query by wallet id and ignore unknown operation types', async () => {
            getHistoryByWallet.mockResolvedValue([historyItem('h-1', 'CashIn', '2024-01-01T00:00:00.000Z')]);

            const res = await request(app)
                .get('/api/history/wallet/w-trusted?operationType=Trade&operationType=Bogus&take=10&skip=5')
                .set('Authorization', AUTH_HEADER);

            expect(res.status).toBe(200);
            expect(getHistoryByWallet).toHaveBeenCalledWith('w-trusted', {
                types: ['Trade'],
                offset: 5,
                limit: 10
            });
            expect(res.body.status).toBe('SUCCESS');
            expect(res.body.data).toEqual([
                {
                    id: 'h-1',
                    walletId: 'w-trusted',
                    type: 'CashIn',
                    assetId: 'BTC',
                    assetPairId: null,
                    amount: 1.5,
                    price: null,
                    state: 'Finished',
                    fee: null,
                    transactionHash: null,
                    timestamp: '2024-01-01T00:00:00.000Z'
                }
            ]);
        });

        it('should address a trading wallet by the client id', async () => {
            await request(app).get('/api/history/wallet/w-trading').set('Authorization', AUTH_HEADER);

            expect(getHistoryByWallet).toHaveBeenCalledWith('client-1', { types: [], offset: 0, limit: 50 });
        });

        it('should answer 404 for another client wallet', async () => {
            const res = await request(app).get('/api/history/wallet/w-foreign').set('Authorization', AUTH_HEADER);

            expect(res.status).toBe(404);
            expect(res.body.error).toBe('Wallet not found');
            expect(getHistoryByWallet).not.toHaveBeenCalled();
        });

        it('should answer 404 for a missing wallet', async () => {
            const res = await request(app).get('/api/history/wallet/w-missing').set('Authorization', AUTH_HEADER);

            expect(res.status).toBe(404);
        });

        it('should reject invalid paging', async () => {
            const res = await request(app).get('/api/history/wallet/w-trusted?take=abc').set('Authorization', AUTH_HEADER);

            expect(res.status).toBe(400);
            expect(res.body.error.message).toBe('Validation failed');
        });

        it('should answer 502 when the history service fails', async () => {
            getHistoryByWallet.mockRejectedValue(
                new DownstreamError('history-service', 'history-service getHistoryByWallet failed')
            );

            const res = await request(app).get('/api/history/wallet/w-trusted').set('Authorization', AUTH_HEADER);

            expect(res.status).toBe(502);
            expect(res.body.error).toBe('history-service getHistoryByWallet failed');
        });
    });

    describe('GET /api/history/:walletId/trades', () => {
        it('should return trades newest first', async () => {
            getTradesByWallet.mockResolvedValue([
                trade('t-1', '2024-01-01T00:00:00.000Z'),
                trade('t-2', '2024-02-01T00:00:00.000Z')
            ]);

            const res = await request(app)
                .get('/api/history/w-trusted/trades?assetPairId=BTCUSD&tradeType=buy')
                .set('Authorization', AUTH_HEADER);

            expect(res.status).toBe(200);
            expect(getTradesByWallet).toHaveBeenCalledWith('w-trusted', {
                assetPairId: 'BTCUSD',
                tradeType: 'buy',
                offset: 0,
                limit: 50
            });
            expect(res.body.data.map((t: { id: string }) => t.id)).toEqual(['t-2', 't-1']);
            expect(res.body.data[0]).toEqual({
                id: 't-2',
                orderId: 'order-t-2',
                assetPairId: 'BTCUSD',
                baseAssetId: 'BTC',
                baseVolume: 0.5,
                quoteAssetId: 'USD',
                quoteVolume: -20000,
                price: 40000,
                fee: { size: 0.001, assetId: 'BTC' },
                timestamp: '2024-02-01T00:00:00.000Z'
            });
        });

        it('should reject a range that does not move forward', async () => {
            const res = await request(app)
                .get('/api/history/w-trusted/trades?from=2024-02-01&to=2024-01-01')
                .set('Authorization', AUTH_HEADER);

            expect(res.status).toBe(400);
            expect(res.body.error).toBe('fromDt value should be less than toDt value');
            expect(getWallet).not.toHaveBeenCalled();
        });

        it('should reject an unknown trade type', async () => {
            const res = await request(app)
                .get('/api/history/w-trusted/trades?tradeType=hold')
                .set('Authorization', AUTH_HEADER);

            expect(res.status).toBe(400);
        });
    });

    describe('GET /api/history/:walletId/funds', () => {
        it('should request both deposits and withdrawals by default', async () => {
            await request(app).get('/api/history/w-trusted/funds').set('Authorization', AUTH_HEADER);

            expect(getHistoryByWallet).toHaveBeenCalledWith('w-trusted', {
                types: ['CashIn', 'CashOut'],
                offset: 0,
                limit: 50
            });
        });

        it('should map the requested operations and date range', async () => {
            await request(app)
                .get('/api/history/w-trading/funds?operation=Withdraw&from=2024-01-01T00:00:00.000Z&to=2024-03-01T00:00:00.000Z')
                .set('Authorization', AUTH_HEADER);

            expect(getHistoryByWallet).toHaveBeenCalledWith('client-1', {
                types: ['CashOut'],
                offset: 0,
                limit: 50,
                from: new Date('2024-01-01T00:00:00.000Z'),
                to: new Date('2024-03-01T00:00:00.000Z')
            });
        });

        it('should return funds movements newest first', async () => {
            getHistoryByWallet.mockResolvedValue([
                historyItem('h-1', 'CashIn', '2024-01-01T00:00:00.000Z'),
                historyItem('h-2', 'Trade', '2024-01-15T00:00:00.000Z'),
                historyItem('h-3', 'CashOut', '2024-02-01T00:00:00.000Z')
            ]);

            const res = await request(app).get('/api/history/w-trusted/funds').set('Authorization', AUTH_HEADER);

            expect(res.status).toBe(200);
            expect(res.body.data).toEqual([
                {
                    id: 'h-3',
                    assetId: 'BTC',
                    amount: 1.5,
                    operation: 'Withdraw',
                    state: 'Finished',
                    fee: null,
                    transactionHash: null,
                    timestamp: '2024-02-01T00:00:00.000Z'
                },
                {
                    id: 'h-1',
                    assetId: 'BTC',
                    amount: 1.5,
                    operation: 'Deposit',
                    state: 'Finished',
                    fee: null,
                    transactionHash: null,
                    timestamp: '2024-01-01T00:00:00.000Z'
                }
            ]);
        });
    });

    describe('GET /api/history/crypto/:assetId/transactions/:transactionHash/links', () => {
        const url = '/api/history/crypto/BTC/transactions/abc123/links';

        it('should return links for the asset integration layer', async () => {
            getAsset.mockResolvedValue({ id: 'BTC', type: 'None', blockchainIntegrationLayerId: 'Bitcoin' });
            getLinks.mockResolvedValue([{ name: 'Explorer', urlFormatted: 'https://explorer.test/tx/abc123' }]);

            const res = await request(app).get(url).set('Authorization', AUTH_HEADER);

            expect(res.status).toBe(200);
            expect(getLinks).toHaveBeenCalledWith('Bitcoin', 'abc123');
            expect(res.body.data).toEqual({ links: [{ name: 'Explorer', url: 'https://explorer.test/tx/abc123' }] });
        });

        it('should use Ethereum for ERC20 tokens', async () => {
            getAsset.mockResolvedValue({ id: 'BTC', type: 'Erc20Token', blockchainIntegrationLayerId: null });

            await request(app).get(url).set('Authorization', AUTH_HEADER);

            expect(getLinks).toHaveBeenCalledWith('Ethereum', 'abc123');
        });

        it('should answer 204 when the asset has no blockchain', async () => {
            getAsset.mockResolvedValue({ id: 'BTC', type: 'None' });

            const res = await request(app).get(url).set('Authorization', AUTH_HEADER);

            expect(res.status).toBe(204);
            expect(getLinks).not.toHaveBeenCalled();
        });

        it('should answer 400 for an unknown asset', async () => {
            const res = await request(app).get(url).set('Authorization', AUTH_HEADER);

            expect(res.status).toBe(400);
            expect(res.body.error).toBe('assetId should exist');
        });
    });
});
