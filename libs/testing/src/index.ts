/**
 * Shared testing utilities
 *
 * In-process fakes for the database, storage and message broker.
 */

// Mocks
export * from './mocks/database.mock';
export * from './mocks/drizzle.mock';
export * from './mocks/rabbitmq.mock';
export * from './mocks/repositories.mock';
export * from './mocks/storage.mock';

// Factories
export * from './factories/survey-batch.factory';
export * from './factories/survey-rows.factory';

// Utilities
export * from './utils/id.util';
export * from './utils/testing-module.util';
export * from './utils/rabbitmq-context.util';
