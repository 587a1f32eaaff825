import { Module, Global } from '@nestjs/common';
import { RabbitmqService } from './rabbitmq.service';

/**
 * Job publisher, available app-wide; ConfigModule is global in both apps
 */
@Global()
@Module({
  providers: [RabbitmqService],
  exports: [RabbitmqService],
})
export class RabbitmqModule {}
