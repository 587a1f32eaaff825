export * from './database.module';
export * from './database.service';
export * from './repositories';
export * from './schema';
