import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { CatalogModule } from '../catalog/catalog.module';
import { NamingModule } from '../naming/naming.module';
import { TranslateModule } from '../translate/translate.module';
import { UpstreamModule } from '../upstream/upstream.module';
import { GatewayController } from './gateway.controller';
import { MessagesService } from './messages.service';

@Module({
  imports: [
    AuthModule,
    CatalogModule,
    NamingModule,
    TranslateModule,
    UpstreamModule,
  ],
  controllers: [GatewayController],
  providers: [MessagesService],
  exports: [MessagesService],
})
export class GatewayModule {}
