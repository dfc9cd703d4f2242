import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { configuration } from './configuration.js';
import { validateEnv } from './env.validation.js';
import { RagSettingsService } from './rag-settings.service.js';
import { SettingsController } from './settings.controller.js';

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [configuration],
      validate: (env) => validateEnv(env),
      envFilePath: ['.env.local', '.env'],
    }),
  ],
  providers: [RagSettingsService],
  controllers: [SettingsController],
  exports: [RagSettingsService],
})
export class AppConfigModule {}
