export * from './survey-columns';
export * from './survey-csv.parser';
export * from './storage-path';
