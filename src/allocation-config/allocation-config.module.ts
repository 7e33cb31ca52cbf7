import { Module } from '@nestjs/common';
import { AllocationConfigService } from './allocation-config.service';

@Module({
  providers: [AllocationConfigService],
  exports: [AllocationConfigService],
})
export class AllocationConfigModule {}
