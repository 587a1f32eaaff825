export * from './llm.types';
export * from './llm.errors';
export * from './llm.config';
export * from './llm-response.decoder';
export * from './fetch-http.client';
export * from './prompt';
export * from './llm-client.service';
export * from './llm.module';
