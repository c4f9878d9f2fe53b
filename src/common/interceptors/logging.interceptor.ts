import {
    Injectable,
    NestInterceptor,
    ExecutionContext,
    CallHandler,
    Logger,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { FastifyRequest, FastifyReply } from 'fastify';

/**
 * One line per request: method, url, status and duration. Streaming
 * responses are logged once the handler has handed the stream to Fastify.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
    private readonly logger = new Logger('HTTP');

    intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
        const ctx = context.switchToHttp();
        const request = ctx.getRequest<FastifyRequest>();
        const response = ctx.getResponse<FastifyReply>();

        const { method, url } = request;
        const requestId = request.id;
        const userAgent = (request.headers['user-agent'] ?? 'unknown').substring(0, 100);

        const startTime = Date.now();

        return next.handle().pipe(
            tap({
                next: () => {
                    const duration = Date.now() - startTime;
                    this.logger.log(
                        `${method} ${url} ${response.statusCode} ${duration}ms [${requestId}] ${userAgent}`,
                    );
                },
                error: (error: Error) => {
                    const duration = Date.now() - startTime;
                    this.logger.warn(
                        `${method} ${url} ERROR ${duration}ms [${requestId}] - ${error.name}: ${error.message}`,
                    );
                },
            }),
        );
    }
}
