import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LlmClientService } from './llm-client.service';

/**
 * Shared module for the LLM client.
 * Import it wherever LlmClientService is needed so a single configured
 * instance is used across the application.
 */
@Module({
  imports: [ConfigModule],
  providers: [LlmClientService],
  exports: [LlmClientService],
})
export class LlmModule {}
