export * from './classification.types';
export * from './classification.rules';
export * from './comment-classifier.service';
