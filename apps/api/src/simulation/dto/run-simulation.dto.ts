import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsIn,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { REBALANCE_FREQUENCIES, RebalanceFrequency } from '../simulation.types';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

// Rates are decimals in [0, 1)
const MAX_RATE = 0.9999;

/** Fields shared by single runs and drop sweeps. */
export class SimulationRequestDto {
  @IsString()
  @Matches(/^[A-Z]{1,5}$/, { message: 'Symbol must be 1-5 uppercase letters' })
  symbol!: string;

  @Matches(ISO_DATE, { message: 'startDate must be in YYYY-MM-DD format' })
  startDate!: string;

  @Matches(ISO_DATE, { message: 'endDate must be in YYYY-MM-DD format' })
  endDate!: string;

  @Type(() => Number)
  @IsNumber()
  @Min(0.01)
  initialCapital!: number;

  @IsIn([...REBALANCE_FREQUENCIES])
  rebalanceFrequency!: RebalanceFrequency;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(MAX_RATE)
  marginRequirement?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(MAX_RATE)
  marginCloseoutFraction?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(MAX_RATE)
  annualCostRate?: number;
}

export class RunSimulationDto extends SimulationRequestDto {
  @Type(() => Number)
  @IsNumber()
  @Min(0.1)
  @Max(0.7)
  maxDropPercent!: number;
}

export class SweepSimulationDto extends SimulationRequestDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(20)
  @Type(() => Number)
  @IsNumber({}, { each: true })
  @Min(0.1, { each: true })
  @Max(0.7, { each: true })
  maxDropPercents!: number[];
}
