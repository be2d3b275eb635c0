import type { HistoryItem, HistoryType, Trade } from '@/clients/schemas';
import type { FundsOperation } from '@/validators/history.validator';

export interface HistoryResponseModel {
    id: string;
    walletId: string;
    type: HistoryType;
    assetId: string | null;
    assetPairId: string | null;
    amount: number | null;
    price: number | null;
    state: string | null;
    fee: FeeModel | null;
    transactionHash: string | null;
    timestamp: string;
}

export interface FeeModel {
    size: number;
    assetId: string | null;
}

export interface TradeResponseModel {
    id: string;
    orderId: string;
    assetPairId: string;
    baseAssetId: string;
    baseVolume: number;
    quoteAssetId: string;
    quoteVolume: number;
    price: number;
    fee: FeeModel | null;
    timestamp: string;
}

export interface FundsResponseModel {
    id: string;
    assetId: string | null;
    amount: number | null;
    operation: FundsOperation;
    state: string | null;
    fee: FeeModel | null;
    transactionHash: string | null;
    timestamp: string;
}

export const FUNDS_HISTORY_TYPES: Record<FundsOperation, HistoryType> = {
    Deposit: 'CashIn',
    Withdraw: 'CashOut'
};

const toFee = (size?: number | null, assetId?: string | null): FeeModel | null =>
    size === undefined || size === null ? null : { size, assetId: assetId ?? null };

export const toHistoryResponse = (item: HistoryItem): HistoryResponseModel => ({
    id: item.id,
    walletId: item.walletId,
    type: item.type,
    assetId: item.assetId ?? null,
    assetPairId: item.assetPairId ?? null,
    amount: item.amount ?? null,
    price: item.price ?? null,
    state: item.state ?? null,
    fee: toFee(item.feeSize, item.feeAssetId),
    transactionHash: item.transactionHash ?? null,
    timestamp: item.timestamp
});

export const toTradeResponse = (trade: Trade): TradeResponseModel => ({
    id: trade.id,
    orderId: trade.orderId,
    assetPairId: trade.assetPairId,
    baseAssetId: trade.baseAssetId,
    baseVolume: trade.baseVolume,
    quoteAssetId: trade.quotingAssetId,
    quoteVolume: trade.quotingVolume,
    price: trade.price,
    fee: toFee(trade.feeSize, trade.feeAssetId),
    timestamp: trade.timestamp
});

/** Only cash-in and cash-out rows are funds movements; anything else is dropped. */
export const toFundsResponse = (item: HistoryItem): FundsResponseModel | null => {
    const operation: FundsOperation | null =
        item.type === 'CashIn' ? 'Deposit' : item.type === 'CashOut' ? 'Withdraw' : null;
    if (!operation) return null;

    return {
        id: item.id,
        assetId: item.assetId ?? null,
        amount: item.amount ?? null,
        operation,
        state: item.state ?? null,
        fee: toFee(item.feeSize, item.feeAssetId),
        transactionHash: item.transactionHash ?? null,
        timestamp: item.timestamp
    };
};

export const byTimestampDesc = (a: { timestamp: string }, b: { timestamp: string }): number =>
    Date.parse(b.timestamp) - Date.parse(a.timestamp);
