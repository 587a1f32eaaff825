export * from './summary.calculations';
export * from './summary-aggregator.service';
