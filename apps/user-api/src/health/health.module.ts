// Import Module decorator
import { Module } from '@nestjs/common';
// Import liveness controller
import { HealthController } from './health.controller';

/**
 * HealthModule - Health check endpoint for monitoring and deployment pipelines
 */
@Module({
  controllers: [HealthController]
})
export class HealthModule {}
