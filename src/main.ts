import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import {
    FastifyAdapter,
    NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { AppModule } from './app.module';

async function bootstrap() {
    const logger = new Logger('Bootstrap');

    // Create Fastify adapter with options
    const fastifyAdapter = new FastifyAdapter({
        logger: {
            level: process.env.LOG_LEVEL || 'info',
            transport:
                process.env.NODE_ENV !== 'production'
                    ? {
                        target: 'pino-pretty',
                        options: {
                            colorize: true,
                            translateTime: 'HH:MM:ss Z',
                            ignore: 'pid,hostname',
                        },
                    }
                    : undefined,
        },
        trustProxy: true,
        bodyLimit: 32 * 1024 * 1024, // inline images make bodies large
        requestIdHeader: 'x-request-id',
        genReqId: () => uuidv4(),
    });

    const app = await NestFactory.create<NestFastifyApplication>(
        AppModule,
        fastifyAdapter,
        {
            bufferLogs: true,
        },
    );

    const configService = app.get(ConfigService);

    // CORS configuration
    app.enableCors({
        origin: configService.get<string>('CORS_ORIGINS', '*').split(','),
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: [
            'Content-Type',
            'Authorization',
            'X-Request-ID',
            'X-Api-Key',
            'Api-Key',
            'Anthropic-Version',
            'Anthropic-Beta',
        ],
        exposedHeaders: ['X-Request-ID'],
        maxAge: 86400,
    });

    // Graceful shutdown
    app.enableShutdownHooks();

    const port = configService.get<number>('PORT', 4141);
    const host = configService.get<string>('HOST', '0.0.0.0');

    await app.listen(port, host);

    logger.log(`Messages bridge listening on http://${host}:${port}`);
    logger.log(`Health check available at http://${host}:${port}/health`);
    logger.log(
        `Environment: ${configService.get<string>('NODE_ENV', 'development')}`,
    );
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
    console.error('Uncaught Exception:', error);
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    console.error('Unhandled Rejection:', reason);
    process.exit(1);
});

bootstrap().catch((error: unknown) => {
    console.error('Failed to start:', error);
    process.exit(1);
});
