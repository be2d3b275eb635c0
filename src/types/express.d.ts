import type { Principal } from '@/auth/types';

declare global {
    namespace Express {
        interface Request {
            id: string;
            startTime: number;
            principal?: Principal;
        }
    }
}

export {};
