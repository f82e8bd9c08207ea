// src/utils/ApiError.ts
import httpStatus from 'http-status';

/** Extra payload attached to an error response: a list of violations or a detail object. */
export type ApiErrorDetails = string[] | Record<string, unknown>;

class ApiError extends Error {
    public statusCode: number;
    public isOperational: boolean;
    public errorDetails?: ApiErrorDetails;

    /**
     * @param statusCode - HTTP status sent to the client.
     * @param message - Envelope message.
     * @param isOperational - False for programming errors; those are masked in production.
     * @param errorDetails - Rendered as the envelope's `data`.
     * @param stack - Stack of a wrapped error, when converting one.
     */
    constructor(
        statusCode: number,
        message: string,
        isOperational = true,
        errorDetails?: ApiErrorDetails,
        stack = ''
    ) {
        super(message);

        this.statusCode = statusCode;
        this.isOperational = isOperational;
        if (errorDetails) {
            this.errorDetails = errorDetails;
        }

        // Keeps instanceof working once compiled down to ES5-style classes
        Object.setPrototypeOf(this, ApiError.prototype);

        if (stack) {
            this.stack = stack;
        } else {
            Error.captureStackTrace(this, this.constructor);
        }

        this.name = this.constructor.name;
    }

    static badRequest(message = String(httpStatus[httpStatus.BAD_REQUEST]), details?: ApiErrorDetails): ApiError {
        return new ApiError(httpStatus.BAD_REQUEST, message, true, details);
    }

    static notFound(message = String(httpStatus[httpStatus.NOT_FOUND]), details?: ApiErrorDetails): ApiError {
        return new ApiError(httpStatus.NOT_FOUND, message, true, details);
    }

    static conflict(message = String(httpStatus[httpStatus.CONFLICT]), details?: ApiErrorDetails): ApiError {
        return new ApiError(httpStatus.CONFLICT, message, true, details);
    }

    static internal(message = String(httpStatus[httpStatus.INTERNAL_SERVER_ERROR]), originalError?: Error): ApiError {
        return new ApiError(httpStatus.INTERNAL_SERVER_ERROR, message, false, undefined, originalError?.stack);
    }
}

export default ApiError;
