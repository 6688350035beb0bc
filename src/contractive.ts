import AutoContractiveMap from './architecture/acm';
import Mst from './methods/mst';

export { config } from './config';
export type { ContractiveMapConfig } from './config';
export { AutoContractiveMap, Mst };
export type { AutoContractiveMapOptions } from './architecture/acm';
export type { MstFunction } from './methods/mst';
export * from './architecture/acm/acm.constants';
export * from './architecture/acm/acm.errors';
export { treeDistance } from './architecture/acm/acm.summary';
export type { TreeEdge } from './architecture/acm/acm.summary';
export type {
  RunMetrics,
  ScheduleConfig,
  TrainingOptions,
  TrainingResult,
} from './architecture/acm/acm.train';
export { rescaleUnitInterval } from './methods/normalization';
export * from './datasets/samples';
export * from './reporting/treePrinter';
export * from './reporting/treeDiagram';
export { run } from './main';
export type { RunOptions, RunReport } from './main';
