export * from './upload-pipeline.service';
