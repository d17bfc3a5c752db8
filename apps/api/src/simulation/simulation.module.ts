import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SimulationService } from './simulation.service';
import { SimulationController } from './simulation.controller';
import { DataModule } from '../data/data.module';
import { SimulationRun } from '../entities/simulation-run.entity';

@Module({
  imports: [TypeOrmModule.forFeature([SimulationRun]), DataModule],
  controllers: [SimulationController],
  providers: [SimulationService],
  exports: [SimulationService],
})
export class SimulationModule {}
