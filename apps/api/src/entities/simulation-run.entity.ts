import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index } from 'typeorm';
import { SimulationParameters } from '../simulation/simulation.types';

@Entity('simulation_runs')
export class SimulationRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column()
  symbol!: string;

  @Column({ type: 'date' })
  startDate!: string;

  @Column({ type: 'date' })
  endDate!: string;

  @Column({ type: 'jsonb' })
  parameters!: SimulationParameters;

  @Column({ default: false })
  liquidated!: boolean;

  @Column({ type: 'date', nullable: true })
  liquidationDate!: string | null;

  @Column('decimal', { precision: 15, scale: 2 })
  finalEquity!: number;

  @Column('decimal', { precision: 10, scale: 2 })
  totalReturnPct!: number;

  @Column('decimal', { precision: 15, scale: 2 })
  totalCostsPaid!: number;

  @Column('decimal', { precision: 18, scale: 6 })
  initialUnits!: number;

  @Column({ type: 'int', default: 0 })
  rebalanceCount!: number;

  // Unleveraged buy-and-hold over the same bars
  @Column('decimal', { precision: 15, scale: 2 })
  benchmarkFinalEquity!: number;

  @Column('decimal', { precision: 10, scale: 2 })
  benchmarkReturnPct!: number;

  @Column({ type: 'int' })
  tradingDays!: number;

  @CreateDateColumn()
  createdAt!: Date;
}
