import { Injectable } from '@nestjs/common';
import { AuthError } from '../../common/errors/proxy-errors';
import { CredentialService } from '../auth/credential.service';
import { ModelCatalogService } from '../catalog/model-catalog.service';

type CheckStatus = 'ok' | 'degraded' | 'unhealthy';

export interface HealthCheckResponse {
    status: CheckStatus;
    timestamp: string;
    uptime: number;
    version: string;
    checks: {
        credential: { status: CheckStatus; mode: 'operator' | 'caller'; expiresAt?: string };
        catalog: { status: CheckStatus; fetchedAt?: string };
    };
}

@Injectable()
export class HealthService {
    private readonly startTime = Date.now();

    constructor(
        private readonly credentials: CredentialService,
        private readonly catalog: ModelCatalogService,
    ) { }

    checkReadiness(): HealthCheckResponse {
        const checks = {
            credential: this.checkCredential(),
            catalog: this.checkCatalog(),
        };

        const statuses = Object.values(checks).map((check) => check.status);
        let status: CheckStatus;
        if (statuses.every((s) => s === 'ok')) {
            status = 'ok';
        } else if (statuses.includes('unhealthy')) {
            status = 'unhealthy';
        } else {
            status = 'degraded';
        }

        return {
            status,
            timestamp: new Date().toISOString(),
            uptime: Math.floor((Date.now() - this.startTime) / 1000),
            version: process.env.npm_package_version || '0.1.0',
            checks,
        };
    }

    private checkCredential(): HealthCheckResponse['checks']['credential'] {
        // Callers bring their own tokens; nothing to check up front
        if (!this.credentials.hasOperatorToken) {
            return { status: 'ok', mode: 'caller' };
        }
        try {
            const credential = this.credentials.current();
            return {
                status: 'ok',
                mode: 'operator',
                expiresAt: new Date(credential.expiresAt).toISOString(),
            };
        } catch (error) {
            if (error instanceof AuthError) {
                return { status: 'unhealthy', mode: 'operator' };
            }
            throw error;
        }
    }

    private checkCatalog(): HealthCheckResponse['checks']['catalog'] {
        const fetchedAt = this.catalog.fetchedAt;
        if (fetchedAt === null) {
            return { status: 'degraded' };
        }
        return { status: 'ok', fetchedAt: new Date(fetchedAt).toISOString() };
    }
}
