export const name = '@packbench/bench';

export * from './cases/instance';
export * from './cases/baseline';
export * from './cases/loader';
export * from './cases/generator';
export * from './parse/solution';
export * from './parse/parser';
export * from './parse/result';
export * from './reconcile/reconcile';
export * from './report/ledger';
export * from './report/progress';
export * from './config/loader';
export * from './harness';
