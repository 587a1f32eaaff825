import {
  Controller,
  Get,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthCheck,
  HealthCheckService,
  MemoryHealthIndicator,
} from '@nestjs/terminus';
import { DatabaseService } from '@app/database';

@Controller('health')
export class HealthController {
  private readonly heapLimitBytes: number;
  private readonly rssLimitBytes: number;

  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly databaseService: DatabaseService,
    configService: ConfigService,
  ) {
    // The worker holds whole CSV files and classification results in memory
    const heapLimitMB = configService.get<number>('HEALTH_HEAP_LIMIT_MB', 300);
    const rssLimitMB = configService.get<number>('HEALTH_RSS_LIMIT_MB', 300);

    this.heapLimitBytes = heapLimitMB * 1024 * 1024;
    this.rssLimitBytes = rssLimitMB * 1024 * 1024;
  }

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', this.heapLimitBytes),
      () => this.memory.checkRSS('memory_rss', this.rssLimitBytes),
    ]);
  }

  @Get('ready')
  async ready() {
    const databaseHealthy = await this.databaseService.healthCheck();

    const responseBody = {
      status: databaseHealthy ? 'ready' : 'not_ready',
      service: 'analysis',
      timestamp: new Date().toISOString(),
      checks: {
        database: databaseHealthy ? 'connected' : 'disconnected',
      },
    };

    if (!databaseHealthy) {
      throw new HttpException(responseBody, HttpStatus.SERVICE_UNAVAILABLE);
    }

    return responseBody;
  }
}
