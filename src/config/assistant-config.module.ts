import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ASSISTANT_CONFIG,
  type AssistantConfig,
  buildAssistantConfig,
} from './assistant.config';

/**
 * Provides the validated AssistantConfig to every module
 */
@Global()
@Module({
  providers: [
    {
      provide: ASSISTANT_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): AssistantConfig =>
        buildAssistantConfig((key) => configService.get<string>(key)),
    },
  ],
  exports: [ASSISTANT_CONFIG],
})
export class AssistantConfigModule {}
