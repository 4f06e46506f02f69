export { MetricsCollector, FAILOVER_STATE_LEVEL } from './metrics-collector';
export type { MetricsCollectorDeps, MetricsSources, MetricStatistics } from './metrics-collector';
