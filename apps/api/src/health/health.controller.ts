import { Controller, Get } from '@nestjs/common';
import { HealthService, SystemHealth } from './health.service';

@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  // Uptime monitors only need the overall status
  @Get()
  async getQuickHealth(): Promise<{ status: string }> {
    const health = await this.healthService.runHealthChecks();
    return { status: health.status };
  }

  @Get('detailed')
  async getDetailedHealth(): Promise<SystemHealth> {
    return this.healthService.runHealthChecks();
  }
}
