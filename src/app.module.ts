import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { RebalanceModule } from './rebalance/rebalance.module';

@Module({
  imports: [RebalanceModule],
  controllers: [AppController],
})
export class AppModule {}
