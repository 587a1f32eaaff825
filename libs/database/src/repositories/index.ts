export * from './survey-batches.repository';
export * from './survey-responses.repository';
export * from './response-comments.repository';
export * from './summaries.repository';
