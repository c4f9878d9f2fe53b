import * as Joi from 'joi';

export const configValidationSchema = Joi.object({
    // Application
    NODE_ENV: Joi.string()
        .valid('development', 'production', 'test')
        .default('development'),
    PORT: Joi.number().port().default(4141),
    HOST: Joi.string().default('0.0.0.0'),
    CORS_ORIGINS: Joi.string().default('*'),
    LOG_LEVEL: Joi.string()
        .valid('fatal', 'error', 'warn', 'info', 'debug', 'trace')
        .default('info'),

    // Upstream account
    GH_TOKEN: Joi.string().allow('').optional(),
    ACCOUNT_TYPE: Joi.string()
        .pattern(/^[a-z0-9-]+$/)
        .default('individual'),
    VSCODE_VERSION: Joi.string().default('1.100.0'),

    // Model naming
    MODEL_RENAME_MAP: Joi.string().optional(),
    MODEL_RENAME_AUTO: Joi.boolean().default(true),

    // Translation
    EMULATE_THINKING: Joi.boolean().default(true),

    // Caching and credentials
    MODELS_CACHE_TTL: Joi.number().integer().min(0).default(300),
    TOKEN_REFRESH_MARGIN_SECS: Joi.number().integer().min(0).default(60),

    // Timeouts
    UPSTREAM_READ_TIMEOUT_MS: Joi.number().default(120000),
    STREAM_MAX_DURATION_MS: Joi.number().default(300000),
});
