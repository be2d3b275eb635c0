import { z } from 'zod';
import { HISTORY_TYPES, TRADE_TYPES, type HistoryType } from '@/clients/schemas';
import { PAGINATION } from '@/constants';

export const FUNDS_OPERATIONS = ['Deposit', 'Withdraw'] as const;
export type FundsOperation = (typeof FUNDS_OPERATIONS)[number];

const isHistoryType = (value: string): value is HistoryType => HISTORY_TYPES.some((type) => type === value);
const isFundsOperation = (value: string): value is FundsOperation => FUNDS_OPERATIONS.some((op) => op === value);

// `?a=1&a=2` arrives as an array, `?a=1` as a string
const repeatable = z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) => (value === undefined ? [] : Array.isArray(value) ? value : [value]));

const take = z.coerce.number().int().min(0).max(PAGINATION.MAX_TAKE).default(PAGINATION.DEFAULT_TAKE);
const skip = z.coerce.number().int().min(0).default(0);

export const walletHistoryQuerySchema = z.object({
    // Unknown operation types are ignored rather than rejected
    operationType: repeatable.transform((values) => values.filter(isHistoryType)),
    assetId: z.string().min(1).optional(),
    assetPairId: z.string().min(1).optional(),
    take,
    skip
});

export const tradesQuerySchema = z.object({
    assetPairId: z.string().min(1).optional(),
    tradeType: z.enum(TRADE_TYPES).optional(),
    take,
    skip,
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional()
});

export const fundsQuerySchema = z.object({
    operation: repeatable.transform((values) => values.filter(isFundsOperation)),
    assetId: z.string().min(1).optional(),
    take,
    skip,
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional()
});

export const isValidDateRange = (from?: Date, to?: Date): boolean => !(from && to && from >= to);

