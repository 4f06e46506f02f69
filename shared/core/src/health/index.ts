export {
  apiClientCheck,
  dataStreamCheck,
  strategyEngineCheck,
  orderEngineCheck,
  persistenceCheck,
} from './health-checks';
export type {
  ApiClientProbe,
  DataStreamProbe,
  StrategyEngineProbe,
  OrderEngineProbe,
  PersistenceProbe,
} from './health-checks';
