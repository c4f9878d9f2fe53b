import { Controller, Get } from '@nestjs/common';
import { HealthCheckResponse, HealthService } from './health.service';

@Controller()
export class HealthController {
    constructor(private readonly healthService: HealthService) { }

    /**
     * Liveness with credential and catalog status. Always 200 while the
     * process is serving.
     */
    @Get(['', 'health'])
    health(): HealthCheckResponse {
        return this.healthService.checkReadiness();
    }

    /**
     * Liveness probe - returns ok if the process is alive
     */
    @Get('health/live')
    live(): { status: string } {
        return { status: 'ok' };
    }
}
