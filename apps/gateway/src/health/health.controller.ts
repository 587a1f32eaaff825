import {
  Controller,
  Get,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import {
  HealthCheck,
  HealthCheckService,
  MemoryHealthIndicator,
} from '@nestjs/terminus';
import { DatabaseService } from '@app/database';
import { RabbitmqService } from '@app/rabbitmq';

@ApiTags('health')
@Controller('health')
export class HealthController {
  private readonly heapLimitBytes: number;
  private readonly rssLimitBytes: number;

  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly databaseService: DatabaseService,
    private readonly rabbitmqService: RabbitmqService,
    configService: ConfigService,
  ) {
    // Multipart uploads are buffered in memory up to 20MB each
    const heapLimitMB = configService.get<number>('HEALTH_HEAP_LIMIT_MB', 200);
    const rssLimitMB = configService.get<number>('HEALTH_RSS_LIMIT_MB', 250);

    this.heapLimitBytes = heapLimitMB * 1024 * 1024;
    this.rssLimitBytes = rssLimitMB * 1024 * 1024;
  }

  @Get()
  @HealthCheck()
  @ApiOperation({ summary: 'Liveness check (process memory)' })
  check() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', this.heapLimitBytes),
      () => this.memory.checkRSS('memory_rss', this.rssLimitBytes),
    ]);
  }

  @Get('ready')
  @ApiOperation({ summary: 'Readiness probe (database and broker)' })
  @ApiResponse({ status: 503, description: 'A dependency is unavailable' })
  async ready() {
    const databaseHealthy = await this.databaseService.healthCheck();
    const brokerHealthy = this.rabbitmqService.healthCheck();
    const healthy = databaseHealthy && brokerHealthy;

    const responseBody = {
      status: healthy ? 'ready' : 'not_ready',
      service: 'gateway',
      timestamp: new Date().toISOString(),
      checks: {
        database: databaseHealthy ? 'connected' : 'disconnected',
        rabbitmq: brokerHealthy ? 'connected' : 'disconnected',
      },
    };

    if (!healthy) {
      throw new HttpException(responseBody, HttpStatus.SERVICE_UNAVAILABLE);
    }

    return responseBody;
  }
}
