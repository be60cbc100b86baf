export const name = '@packbench/exec';

export * from './command/parser';
export * from './runner/process';
export * from './runner/artifact';
export * from './runner/invoker';
export * from './runner/pool';
