import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { RebalanceService } from './rebalance.service';
import { RebalanceRequestDto } from './dto/rebalance-request.dto';
import { RebalanceResponseDto, toRebalanceResponse } from './dto/rebalance-response.dto';

@Controller('rebalance')
export class RebalanceController {
  constructor(private readonly rebalanceService: RebalanceService) {}

  /**
   * Computes how to split an investment across categories.
   * Stateless - every input comes from the request body.
   *
   * POST /rebalance
   * @returns 200 with per-category recommendation
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  rebalance(@Body() request: RebalanceRequestDto): RebalanceResponseDto {
    return toRebalanceResponse(this.rebalanceService.fromRequest(request));
  }
}
