export * from './job-runner.service';
