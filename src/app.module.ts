import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { InfrastructureModule } from './infrastructure/infrastructure.module';
import { ApplicationModule } from './application/application.module';
import { ProcessingModule } from './processing/processing.module';

/**
 * Application Module
 * SQS-based pipeline worker computing ssdeep hashes for batches of files
 */
@Module({
  imports: [ConfigModule, SharedModule, InfrastructureModule, ApplicationModule, ProcessingModule],
})
export class AppModule {}
