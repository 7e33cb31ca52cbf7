import { Module } from '@nestjs/common';
import { BalanceLoaderService } from './balance-loader.service';

@Module({
  providers: [BalanceLoaderService],
  exports: [BalanceLoaderService],
})
export class BalancesModule {}
