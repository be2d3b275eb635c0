import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface StubReply {
    status: number;
    data?: unknown;
}

export interface AxiosStub {
    http: AxiosInstance;
    calls: InternalAxiosRequestConfig[];
}

/** An axios instance whose adapter answers in process instead of touching the network. */
export const stubAxios = (reply: (config: InternalAxiosRequestConfig) => StubReply): AxiosStub => {
    const calls: InternalAxiosRequestConfig[] = [];

    const http = axios.create({
        baseURL: 'http://downstream.test',
        adapter: async (config) => {
            calls.push(config);
            const { status, data } = reply(config);
            const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };

            if (status >= 400) {
                throw new AxiosError(
                    `Request failed with status code ${status}`,
                    AxiosError.ERR_BAD_RESPONSE,
                    config,
                    null,
                    response
                );
            }
            return response;
        }
    });

    return { http, calls };
};
