import { Module } from '@nestjs/common';
import { ConfigModule } from '../../../config/config.module';
import { LoggingModule } from '../../logging/logging.module';
import { SqsService } from './sqs.service';

@Module({
  imports: [ConfigModule, LoggingModule],
  providers: [SqsService],
  exports: [SqsService],
})
export class SqsModule {}
