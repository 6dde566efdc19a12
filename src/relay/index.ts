/**
 * Relay Module
 *
 * Pipeline wiring and in-process metrics.
 */

export { Relay, RELAY_VERSION } from "./relay.ts";
export type { RelayOptions, RelayStatus } from "./relay.ts";

export { RelayMetrics, noopMetrics, toPrometheusText } from "./metrics.ts";
export type {
  CounterName,
  GaugeName,
  MetricsSink,
  MetricsSnapshot,
  ProcessingTimeSummary,
} from "./metrics.ts";
