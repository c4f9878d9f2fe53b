import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { NamingModule } from '../naming/naming.module';
import { UpstreamModule } from '../upstream/upstream.module';
import { ModelCatalogService } from './model-catalog.service';

@Module({
  imports: [AuthModule, NamingModule, UpstreamModule],
  providers: [ModelCatalogService],
  exports: [ModelCatalogService],
})
export class CatalogModule {}
