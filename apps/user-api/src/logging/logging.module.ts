import { Global, Module } from '@nestjs/common';
import { JsonLogger } from './json-logger.service';

/**
 * LoggingModule - Provides one JsonLogger for the whole application
 */
@Global()
@Module({
  providers: [{ provide: JsonLogger, useFactory: () => new JsonLogger('user-api') }],
  exports: [JsonLogger]
})
export class LoggingModule {}
