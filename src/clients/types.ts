import type { Asset, ExplorerLink, HistoryItem, HistoryType, Trade, TradeType, Wallet } from '@/clients/schemas';

export interface HistoryQuery {
    types: HistoryType[];
    assetId?: string;
    assetPairId?: string;
    offset: number;
    limit: number;
    from?: Date;
    to?: Date;
}

export interface TradesQuery {
    assetPairId?: string;
    tradeType?: TradeType;
    offset: number;
    limit: number;
    from?: Date;
    to?: Date;
}

export interface AccountClient {
    getWallet(walletId: string): Promise<Wallet | null>;
}

export interface HistoryClient {
    getHistoryByWallet(walletId: string, query: HistoryQuery): Promise<HistoryItem[]>;
    getTradesByWallet(walletId: string, query: TradesQuery): Promise<Trade[]>;
}

export interface AssetsClient {
    getAsset(assetId: string): Promise<Asset | null>;
}

export interface ExplorerLinkProvider {
    getLinks(blockchainType: string, transactionHash: string): Promise<ExplorerLink[]>;
}
