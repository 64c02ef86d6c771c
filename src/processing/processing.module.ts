import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { SsdeepTaskConsumer } from './consumers/ssdeep-task.consumer';

@Module({
  imports: [ApplicationModule, InfrastructureModule],
  providers: [SsdeepTaskConsumer],
})
export class ProcessingModule {}
