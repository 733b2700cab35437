import { logger } from "@/config/logger";

export class ApiResponse<T = unknown> {
    statusCode: number;
    success: boolean;
    message: string;
    data?: T;
    constructor(statusCode: number, message: string, data?: T, context = 'Global') {
        logger.info(`[${context}] : ${message}`);
        this.statusCode = statusCode;
        this.success = statusCode >= 200 && statusCode < 400;
        this.message = message;
        this.data = data;
    }
}


export const getApiResponseClass = function (context: string) {
    return class<T = unknown> extends ApiResponse<T> {
        constructor(statusCode: number, message: string, data?: T) {
            super(statusCode, message, data, context);
        }
    };
}
