import {
    ExceptionFilter,
    Catch,
    ArgumentsHost,
    HttpException,
    HttpStatus,
    Logger,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { ErrorBody, StreamError, errorBody } from '../errors/proxy-errors';

type ErrorResponse = ErrorBody & { request_id: string };

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
    private readonly logger = new Logger(AllExceptionsFilter.name);

    catch(exception: unknown, host: ArgumentsHost): void {
        const ctx = host.switchToHttp();
        const response = ctx.getResponse<FastifyReply>();
        const request = ctx.getRequest<FastifyRequest>();

        const requestId = request.id;

        let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
        let body: ErrorBody = errorBody('api_error', 'Internal server error', 'internal_error');

        if (exception instanceof HttpException) {
            status = exception.getStatus();
            body = this.toErrorBody(exception, status);
        } else if (exception instanceof StreamError) {
            body = errorBody('api_error', exception.message, 'stream_error');
        } else if (exception instanceof Error) {
            // Log unexpected errors
            this.logger.error(
                `Unexpected error: ${exception.message}`,
                exception.stack,
            );
        }

        const { message, type } = body.error;
        if (status >= 500) {
            this.logger.error(`${request.method} ${request.url} ${status} - ${message} [${requestId}]`);
        } else {
            this.logger.warn(`${request.method} ${request.url} ${status} - ${message} [${requestId}]`);
        }

        // Headers are gone once a stream started; end it with an error event
        if (response.sent || response.raw.headersSent) {
            if (!response.raw.writableEnded) {
                response.raw.end(`event: error\ndata: ${JSON.stringify({ type: 'error', error: { type, message } })}\n\n`);
            }
            return;
        }

        const errorResponse: ErrorResponse = { ...body, request_id: requestId };
        response.header('x-request-id', requestId);
        response.status(status).send(errorResponse);
    }

    /**
     * Our own exceptions already carry a Messages error body; anything else
     * Nest raises (unknown route, oversized body) is classified by status.
     */
    private toErrorBody(exception: HttpException, status: number): ErrorBody {
        const exceptionResponse = exception.getResponse();
        if (isErrorBody(exceptionResponse)) {
            return exceptionResponse;
        }
        return errorBody(this.getErrorType(status), exception.message, this.getErrorCode(status));
    }

    private getErrorType(status: number): string {
        switch (status) {
            case 400:
            case 422:
                return 'invalid_request_error';
            case 401:
                return 'authentication_error';
            case 403:
                return 'permission_error';
            case 404:
                return 'not_found_error';
            case 413:
                return 'request_too_large';
            case 429:
                return 'rate_limit_error';
            case 529:
                return 'overloaded_error';
            default:
                return status >= 500 ? 'api_error' : 'invalid_request_error';
        }
    }

    private getErrorCode(status: number): string {
        switch (status) {
            case 400:
                return 'bad_request';
            case 401:
                return 'unauthorized';
            case 403:
                return 'forbidden';
            case 404:
                return 'not_found';
            case 413:
                return 'payload_too_large';
            case 422:
                return 'unprocessable_entity';
            case 429:
                return 'rate_limit_exceeded';
            default:
                return status >= 500 ? 'internal_error' : 'bad_request';
        }
    }
}

function isErrorBody(value: unknown): value is ErrorBody {
    if (typeof value !== 'object' || value === null || !('type' in value) || !('error' in value)) {
        return false;
    }
    const { error } = value;
    return (
        value.type === 'error' &&
        typeof error === 'object' &&
        error !== null &&
        'message' in error &&
        typeof error.message === 'string'
    );
}
