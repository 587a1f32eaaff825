export * from './storage.types';
export * from './local-storage.service';
export * from './storage.module';
