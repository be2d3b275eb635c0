import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { DownstreamError } from '@/errors/app-error';

export const createHttpClient = (baseURL: string, timeoutMs: number): AxiosInstance =>
    axios.create({
        baseURL,
        timeout: timeoutMs,
        headers: { Accept: 'application/json' }
    });

export const isNotFound = (error: unknown): boolean =>
    axios.isAxiosError(error) && error.response?.status === 404;

export const toDownstreamError = (service: string, operation: string, error: unknown): DownstreamError => {
    if (error instanceof DownstreamError) return error;

    const status = axios.isAxiosError(error) ? error.response?.status : undefined;
    const message = error instanceof Error ? error.message : String(error);

    return new DownstreamError(service, `${service} ${operation} failed`, { status, error: message });
};

export const parseResponse = <T extends z.ZodType>(schema: T, data: unknown, service: string): z.output<T> => {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        throw new DownstreamError(service, `${service} returned an unexpected response`, {
            issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        });
    }
    return parsed.data;
};
