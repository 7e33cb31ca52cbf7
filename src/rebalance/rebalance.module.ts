import { Module } from '@nestjs/common';
import { RebalanceController } from './rebalance.controller';
import { RebalanceService } from './rebalance.service';
import { AllocationService } from './allocation.service';
import { AllocationConfigModule } from '../allocation-config/allocation-config.module';

@Module({
  imports: [AllocationConfigModule], // request bodies reuse the config validation
  controllers: [RebalanceController],
  providers: [
    AllocationService, // aggregate, analyze, distribute
    RebalanceService,  // pipeline shared by HTTP and CLI
  ],
  exports: [RebalanceService],
})
export class RebalanceModule {}
