import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from './database/database.module';
import { DataModule } from './data/data.module';
import { HealthModule } from './health/health.module';
import { SimulationModule } from './simulation/simulation.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['../../.env', '.env'],
    }),
    DatabaseModule,
    DataModule,
    HealthModule,
    SimulationModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
