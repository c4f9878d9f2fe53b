import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { CatalogModule } from '../catalog/catalog.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
    imports: [AuthModule, CatalogModule],
    controllers: [HealthController],
    providers: [HealthService],
})
export class HealthModule { }
