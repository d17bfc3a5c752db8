import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  NotFoundException,
  Post,
  Query,
} from '@nestjs/common';
import { MarketDataError } from '../data/data.types';
import { parseBarDate } from './daily-bar';
import { RunSimulationDto, SimulationRequestDto, SweepSimulationDto } from './dto/run-simulation.dto';
import { InvalidInputError } from './simulation.errors';
import { SimulationService } from './simulation.service';

function toUtcDate(value: string, field: string): Date {
  try {
    const { year, month, day } = parseBarDate(value);
    return new Date(Date.UTC(year, month - 1, day));
  } catch (error) {
    if (error instanceof InvalidInputError) {
      throw new BadRequestException(`${field} is not a valid date`);
    }
    throw error;
  }
}

function validateDateRange(input: SimulationRequestDto): void {
  const start = toUtcDate(input.startDate, 'startDate');
  const end = toUtcDate(input.endDate, 'endDate');
  if (end <= start) {
    throw new BadRequestException('endDate must be after startDate');
  }
  if (start > new Date()) {
    throw new BadRequestException('startDate cannot be in the future');
  }
}

function toHttpError(error: unknown): unknown {
  if (error instanceof InvalidInputError) {
    return new BadRequestException(error.message);
  }
  if (error instanceof MarketDataError) {
    return error.reason === 'no_data'
      ? new NotFoundException(error.message)
      : new BadGatewayException(error.message);
  }
  return error;
}

@Controller('simulation')
export class SimulationController {
  constructor(private readonly simulationService: SimulationService) {}

  @Post('run')
  async runSimulation(@Body() input: RunSimulationDto) {
    validateDateRange(input);
    try {
      return await this.simulationService.runSimulation(input);
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Post('sweep')
  async runSweep(@Body() input: SweepSimulationDto) {
    validateDateRange(input);
    try {
      return await this.simulationService.runSweep(input);
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Get('stats')
  async getStats() {
    return this.simulationService.getSimulationStats();
  }

  @Get('history')
  async getHistory(@Query('limit') limit?: string) {
    const parsed = limit ? parseInt(limit, 10) : 50;
    if (isNaN(parsed) || parsed < 1) {
      throw new BadRequestException('limit must be a positive integer');
    }
    return this.simulationService.getSimulationHistory(parsed);
  }

  @Delete('history')
  async clearHistory() {
    const count = await this.simulationService.clearSimulationHistory();
    return { cleared: count };
  }
}
