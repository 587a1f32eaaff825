export * from './rabbitmq.module';
export * from './rabbitmq.service';
export * from './rabbitmq.constants';
export * from './rabbitmq.options';
