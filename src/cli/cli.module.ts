import { Module } from '@nestjs/common';
import { RebalanceCommand } from './rebalance.command';
import { RebalanceModule } from '../rebalance/rebalance.module';
import { BalancesModule } from '../balances/balances.module';
import { AllocationConfigModule } from '../allocation-config/allocation-config.module';

@Module({
  imports: [RebalanceModule, BalancesModule, AllocationConfigModule],
  providers: [RebalanceCommand],
})
export class CliModule {}
