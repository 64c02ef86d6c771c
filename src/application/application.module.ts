import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { CalculateSsdeepHashesUseCase } from './use-cases';
import { InputFileResolverService } from './services/input-file-resolver.service';

/**
 * Application Module
 * Contains the use case and application services
 *
 * Use cases depend on output ports (interfaces); the adapters behind the port
 * tokens come from the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [InputFileResolverService, CalculateSsdeepHashesUseCase],
  exports: [CalculateSsdeepHashesUseCase],
})
export class ApplicationModule {}
