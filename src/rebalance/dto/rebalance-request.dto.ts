import { IsNotEmpty, IsObject, IsOptional, IsString } from 'class-validator';

// Everything needed for one stateless recommendation.
// Numbers may be sent as strings to keep their exact decimal value.
export class RebalanceRequestDto {
  @IsObject()
  categories!: Record<string, string[]>;          // { "Stocks": ["VTI", "VXUS"] }

  @IsObject()
  targetAllocation!: Record<string, string | number>;  // { "Stocks": "0.6" }

  @IsObject()
  balances!: Record<string, string | number>;     // { "VTI": "6000.00" }

  @IsString()
  @IsNotEmpty()
  investmentAmount!: string;                      // "2,000" or "2000.00"

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  cashSymbol?: string;                            // dropped from balances when present
}
