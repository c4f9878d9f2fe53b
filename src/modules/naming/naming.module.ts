import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  MODEL_NAMING_OPTIONS,
  ModelNameMapper,
  ModelNamingOptions,
  parseRenameMap,
} from './model-name.mapper';

@Module({
  providers: [
    {
      provide: MODEL_NAMING_OPTIONS,
      useFactory: (config: ConfigService): ModelNamingOptions => ({
        autoRename: config.get<boolean>('MODEL_RENAME_AUTO', true),
        overrides: parseRenameMap(
          config.get<string>('MODEL_RENAME_MAP'),
          new Logger('ModelNaming'),
        ),
      }),
      inject: [ConfigService],
    },
    ModelNameMapper,
  ],
  exports: [ModelNameMapper],
})
export class NamingModule {}
