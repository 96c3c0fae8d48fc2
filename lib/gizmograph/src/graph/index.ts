export { createInterpreter, GraphInterpreter } from './interpreter';
export type { InterpreterDefinition, InterpreterOperator, ProviderRegistry } from './operator-types';
