export { OperationRegistry } from './registry';
export { EvaluationContext } from './evaluation-context';
export type { EvaluationContextInit } from './evaluation-context';
export { EvaluationHookManager } from './hook-manager';
export { runNode } from './node-executor';
export { runGraph } from './graph-runner';
export type { RunGraphOptions } from './graph-runner';
