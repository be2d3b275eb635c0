import { z } from 'zod';

export const WALLET_TYPES = ['Trading', 'Trusted'] as const;

export const walletSchema = z.object({
    id: z.string(),
    clientId: z.string(),
    type: z.enum(WALLET_TYPES),
    name: z.string().nullish()
});

export const HISTORY_TYPES = ['CashIn', 'CashOut', 'Trade', 'OrderEvent'] as const;

export const historyItemSchema = z.object({
    id: z.string(),
    walletId: z.string(),
    type: z.enum(HISTORY_TYPES),
    assetId: z.string().nullish(),
    assetPairId: z.string().nullish(),
    amount: z.number().nullish(),
    price: z.number().nullish(),
    state: z.string().nullish(),
    feeSize: z.number().nullish(),
    feeAssetId: z.string().nullish(),
    transactionHash: z.string().nullish(),
    timestamp: z.iso.datetime({ offset: true })
});

export const TRADE_TYPES = ['buy', 'sell'] as const;

export const tradeSchema = z.object({
    id: z.string(),
    walletId: z.string(),
    orderId: z.string(),
    assetPairId: z.string(),
    baseAssetId: z.string(),
    baseVolume: z.number(),
    quotingAssetId: z.string(),
    quotingVolume: z.number(),
    price: z.number(),
    feeSize: z.number().nullish(),
    feeAssetId: z.string().nullish(),
    timestamp: z.iso.datetime({ offset: true })
});

export const assetSchema = z.object({
    id: z.string(),
    name: z.string().nullish(),
    type: z.string().nullish(),
    blockchainIntegrationLayerId: z.string().nullish()
});

export const explorerLinkSchema = z.object({
    name: z.string(),
    urlFormatted: z.string()
});

export const sessionSchema = z.object({
    clientId: z.string().min(1),
    partnerId: z.string().nullish()
});

export type Wallet = z.infer<typeof walletSchema>;
export type HistoryType = (typeof HISTORY_TYPES)[number];
export type HistoryItem = z.infer<typeof historyItemSchema>;
export type TradeType = (typeof TRADE_TYPES)[number];
export type Trade = z.infer<typeof tradeSchema>;
export type Asset = z.infer<typeof assetSchema>;
export type ExplorerLink = z.infer<typeof explorerLinkSchema>;
export type Session = z.infer<typeof sessionSchema>;
