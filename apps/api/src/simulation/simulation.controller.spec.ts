import { BadGatewayException, BadRequestException, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { MarketDataError } from '../data/data.types';
import { RunSimulationDto, SweepSimulationDto } from './dto/run-simulation.dto';
import { SimulationController } from './simulation.controller';
import { InvalidInputError } from './simulation.errors';
import { SimulationService } from './simulation.service';

const runInput = (overrides: Partial<RunSimulationDto> = {}): RunSimulationDto =>
  Object.assign(new RunSimulationDto(), {
    symbol: 'SPY',
    startDate: '2024-01-02',
    endDate: '2024-06-28',
    initialCapital: 10000,
    maxDropPercent: 0.3,
    rebalanceFrequency: 'Monthly',
    ...overrides,
  });

describe('SimulationController', () => {
  const service = {
    runSimulation: jest.fn(),
    runSweep: jest.fn(),
    getSimulationStats: jest.fn(),
    getSimulationHistory: jest.fn(),
    clearSimulationHistory: jest.fn(),
  };
  let controller: SimulationController;

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [SimulationController],
      providers: [{ provide: SimulationService, useValue: service }],
    }).compile();
    controller = moduleRef.get(SimulationController);
  });

  it('returns the simulation report', async () => {
    const report = { summary: { liquidated: false } };
    service.runSimulation.mockResolvedValue(report);

    await expect(controller.runSimulation(runInput())).resolves.toBe(report);
  });

  it('rejects an end date on or before the start date', async () => {
    await expect(
      controller.runSimulation(runInput({ startDate: '2024-06-28', endDate: '2024-06-28' })),
    ).rejects.toThrow(new BadRequestException('endDate must be after startDate'));
    expect(service.runSimulation).not.toHaveBeenCalled();
  });

  it.each([
    ['startDate', { startDate: '2023-02-29' }],
    ['endDate', { endDate: '2024-06-31' }],
  ])('rejects an impossible calendar %s', async (field, override) => {
    await expect(controller.runSimulation(runInput(override))).rejects.toThrow(
      new BadRequestException(`${field} is not a valid date`),
    );
    expect(service.runSimulation).not.toHaveBeenCalled();
  });

  it('accepts a leap day', async () => {
    service.runSimulation.mockResolvedValue({});

    await controller.runSimulation(runInput({ startDate: '2024-02-29' }));

    expect(service.runSimulation).toHaveBeenCalledTimes(1);
  });

  it('rejects a start date in the future', async () => {
    await expect(
      controller.runSimulation(runInput({ startDate: '2999-01-04', endDate: '2999-02-01' })),
    ).rejects.toThrow(new BadRequestException('startDate cannot be in the future'));
  });

  it('maps invalid parameters to 400', async () => {
    service.runSimulation.mockRejectedValue(new InvalidInputError('annualCostRate must be in [0, 1), got 1'));

    await expect(controller.runSimulation(runInput())).rejects.toBeInstanceOf(BadRequestException);
  });

  it('maps a missing series to 404', async () => {
    service.runSimulation.mockRejectedValue(new MarketDataError('No data available for SPY', 'no_data'));

    await expect(controller.runSimulation(runInput())).rejects.toBeInstanceOf(NotFoundException);
  });

  it('maps an upstream failure to 502', async () => {
    service.runSweep.mockRejectedValue(new MarketDataError('Polygon API error: 500 Internal Server Error', 'upstream'));

    const { maxDropPercent, ...request } = runInput();

    await expect(
      controller.runSweep(Object.assign(new SweepSimulationDto(), request, { maxDropPercents: [maxDropPercent] })),
    ).rejects.toBeInstanceOf(BadGatewayException);
  });

  it('passes other errors through unchanged', async () => {
    const failure = new Error('connection reset');
    service.runSimulation.mockRejectedValue(failure);

    await expect(controller.runSimulation(runInput())).rejects.toBe(failure);
  });

  it('defaults the history limit to 50', async () => {
    service.getSimulationHistory.mockResolvedValue([]);

    await controller.getHistory();

    expect(service.getSimulationHistory).toHaveBeenCalledWith(50);
  });

  it('rejects a non-numeric history limit', async () => {
    await expect(controller.getHistory('abc')).rejects.toBeInstanceOf(BadRequestException);
  });

  it('reports how many runs were cleared', async () => {
    service.clearSimulationHistory.mockResolvedValue(2);

    await expect(controller.clearHistory()).resolves.toEqual({ cleared: 2 });
  });
});
