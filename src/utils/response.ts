// src/utils/response.ts
import { Response } from 'express';

/** Envelope shared by every response the API sends. */
export interface ApiResponse<T> {
    success: boolean;
    message: string;
    data: T | null;
}

export const sendSuccess = <T>(res: Response, statusCode: number, message: string, data: T | null = null): void => {
    const body: ApiResponse<T> = { success: true, message, data };
    res.status(statusCode).json(body);
};
