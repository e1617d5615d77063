import { Controller, Get, Logger } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { MilvusHealthIndicator } from './milvus.health';

@ApiTags('health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly health: HealthCheckService,
    private readonly milvusHealth: MilvusHealthIndicator,
  ) { }

  @Get()
  @HealthCheck()
  check() {
    this.logger.debug('Health check endpoint called.');
    return this.health.check([() => this.milvusHealth.isHealthy('milvus')]);
  }
}
