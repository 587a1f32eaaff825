export * from './upload-metadata.dto';
export * from './lecture-query.dto';
export * from './upload-response.dto';
export * from './batch-status.dto';
export * from './summary-response.dto';
export * from './comment-list-query.dto';
export * from './comment.dto';
