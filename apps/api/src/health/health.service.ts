import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';

export type HealthStatus = 'healthy' | 'degraded' | 'critical';

export interface ComponentHealth {
  status: HealthStatus;
  responseTime?: number;
  message?: string;
}

export interface SystemHealth {
  status: HealthStatus;
  timestamp: Date;
  components: {
    database: ComponentHealth;
  };
}

const SLOW_QUERY_MS = 2000;

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  async runHealthChecks(): Promise<SystemHealth> {
    const database = await this.checkDatabase();

    if (database.status !== 'healthy') {
      this.logger.warn(`Database ${database.status}: ${database.message ?? 'no detail'}`);
    }

    return {
      status: database.status,
      timestamp: new Date(),
      components: { database },
    };
  }

  private async checkDatabase(): Promise<ComponentHealth> {
    const start = Date.now();
    try {
      await this.dataSource.query('SELECT 1');
      const responseTime = Date.now() - start;

      if (responseTime > SLOW_QUERY_MS) {
        return { status: 'degraded', responseTime, message: 'Slow' };
      }

      return { status: 'healthy', responseTime };
    } catch (error) {
      return {
        status: 'critical',
        responseTime: Date.now() - start,
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
