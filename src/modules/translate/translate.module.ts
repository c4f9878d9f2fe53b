import { Module } from '@nestjs/common';
import { NamingModule } from '../naming/naming.module';
import { TranslationService } from './translation.service';

@Module({
  imports: [NamingModule],
  providers: [TranslationService],
  exports: [TranslationService],
})
export class TranslateModule {}
