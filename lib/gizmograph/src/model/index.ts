export { ExternalParameter, ExternalParameterValues } from './external-parameters';
export { GraphModel } from './graph-model';
