export * from './survey-batches.schema';
export * from './survey-responses.schema';
export * from './response-comments.schema';
export * from './survey-summaries.schema';
export * from './comment-summaries.schema';
