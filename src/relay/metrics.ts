/**
 * Relay Metrics
 *
 * In-process counters, gauges and a processing-time summary.
 * Components report through the MetricsSink interface; the status server
 * reads a snapshot, as JSON or in Prometheus text exposition format.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type CounterName =
  | "messagesReceived"   // UDP datagrams received
  | "messagesParsed"     // Sentences that produced a position record
  | "parseErrors"        // Sentences rejected by the parser
  | "decodeErrors"       // Datagrams that weren't valid UTF-8
  | "ingestDropped"      // Datagrams discarded at the concurrency cap
  | "cotConversions"     // Position records converted to CoT
  | "conversionErrors"   // Conversion failures
  | "cotQueued"          // Events accepted by the TAK link
  | "cotSendErrors"      // Events the TAK link refused (timeout or error)
  | "devicesCreated";    // New device identities

export type GaugeName =
  | "activeDevices"      // Devices seen since the last cleanup
  | "takConnected";      // 1 when the TAK link is connected

/** What the relay components report into */
export interface MetricsSink {
  increment(counter: CounterName, by?: number): void;
  setGauge(gauge: GaugeName, value: number): void;
  /** End-to-end handling time of one position record, in seconds */
  observeProcessingTime(seconds: number): void;
}

export interface ProcessingTimeSummary {
  count: number;
  sum: number;
  max: number;
  /** Cumulative counts per upper bound (seconds) */
  buckets: Record<string, number>;
}

export interface MetricsSnapshot {
  counters: Record<CounterName, number>;
  gauges: Record<GaugeName, number>;
  processingTime: ProcessingTimeSummary;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

const PROCESSING_TIME_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1.0] as const;

const emptyCounters = (): Record<CounterName, number> => ({
  messagesReceived: 0,
  messagesParsed: 0,
  parseErrors: 0,
  decodeErrors: 0,
  ingestDropped: 0,
  cotConversions: 0,
  conversionErrors: 0,
  cotQueued: 0,
  cotSendErrors: 0,
  devicesCreated: 0,
});

// ═══════════════════════════════════════════════════════════════════════════════
// IMPLEMENTATIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Sink that discards everything (default for components built without one) */
export const noopMetrics: MetricsSink = {
  increment: () => {},
  setGauge: () => {},
  observeProcessingTime: () => {},
};

export class RelayMetrics implements MetricsSink {
  private counters = emptyCounters();
  private gauges: Record<GaugeName, number> = { activeDevices: 0, takConnected: 0 };
  private bucketCounts: number[] = PROCESSING_TIME_BUCKETS.map(() => 0);
  private observations = 0;
  private observedSum = 0;
  private observedMax = 0;

  increment(counter: CounterName, by = 1): void {
    this.counters[counter] += by;
  }

  setGauge(gauge: GaugeName, value: number): void {
    this.gauges[gauge] = value;
  }

  observeProcessingTime(seconds: number): void {
    this.observations++;
    this.observedSum += seconds;
    this.observedMax = Math.max(this.observedMax, seconds);
    PROCESSING_TIME_BUCKETS.forEach((bound, i) => {
      if (seconds <= bound) {
        this.bucketCounts[i]++;
      }
    });
  }

  getCounter(counter: CounterName): number {
    return this.counters[counter];
  }

  getGauge(gauge: GaugeName): number {
    return this.gauges[gauge];
  }

  snapshot(): MetricsSnapshot {
    const buckets: Record<string, number> = {};
    PROCESSING_TIME_BUCKETS.forEach((bound, i) => {
      buckets[String(bound)] = this.bucketCounts[i];
    });
    buckets["+Inf"] = this.observations;

    return {
      counters: { ...this.counters },
      gauges: { ...this.gauges },
      processingTime: {
        count: this.observations,
        sum: this.observedSum,
        max: this.observedMax,
        buckets,
      },
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROMETHEUS EXPOSITION
// ═══════════════════════════════════════════════════════════════════════════════

interface MetricDescription {
  name: string;
  help: string;
}

const COUNTER_METRICS: ReadonlyArray<MetricDescription & { counter: CounterName }> = [
  { counter: "messagesReceived", name: "gpgga_messages_received_total", help: "Total number of GPGGA messages received" },
  { counter: "messagesParsed", name: "gpgga_messages_parsed_total", help: "Total number of GPGGA messages successfully parsed" },
  { counter: "parseErrors", name: "gpgga_parse_errors_total", help: "Total number of GPGGA parse errors" },
  { counter: "decodeErrors", name: "gpgga_decode_errors_total", help: "Total number of datagrams that were not valid UTF-8" },
  { counter: "ingestDropped", name: "gpgga_ingest_dropped_total", help: "Total number of parsed reports dropped at the concurrency cap" },
  { counter: "cotConversions", name: "cot_conversions_total", help: "Total number of successful CoT conversions" },
  { counter: "conversionErrors", name: "cot_conversion_errors_total", help: "Total number of failed CoT conversions" },
  { counter: "cotQueued", name: "cot_messages_sent_total", help: "Total number of CoT messages sent to TAK" },
  { counter: "cotSendErrors", name: "cot_send_errors_total", help: "Total number of errors sending CoT to TAK" },
  { counter: "devicesCreated", name: "cot_devices_created_total", help: "Total number of device identities created" },
];

const GAUGE_METRICS: ReadonlyArray<MetricDescription & { gauge: GaugeName }> = [
  { gauge: "activeDevices", name: "active_devices_count", help: "Number of devices seen in the last period" },
  { gauge: "takConnected", name: "tak_connection_status", help: "TAK server connection status (1=connected, 0=disconnected)" },
];

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

/**
 * Render a snapshot in Prometheus text format (version 0.0.4).
 * `info` becomes the labels of a constant `gpgga_cot_relay_info` gauge.
 */
export function toPrometheusText(snapshot: MetricsSnapshot, info: Record<string, string> = {}): string {
  const lines: string[] = [];

  for (const { counter, name, help } of COUNTER_METRICS) {
    lines.push(`# HELP ${name} ${help}`, `# TYPE ${name} counter`);
    lines.push(`${name} ${snapshot.counters[counter]}`);
  }

  for (const { gauge, name, help } of GAUGE_METRICS) {
    lines.push(`# HELP ${name} ${help}`, `# TYPE ${name} gauge`);
    lines.push(`${name} ${snapshot.gauges[gauge]}`);
  }

  const histogram = "message_processing_seconds";
  lines.push(`# HELP ${histogram} Time to process a GPGGA message to CoT`, `# TYPE ${histogram} histogram`);
  // bucket keys like "1" sort first in object order, so walk the bounds instead
  for (const bound of [...PROCESSING_TIME_BUCKETS.map(String), "+Inf"]) {
    lines.push(`${histogram}_bucket{le="${bound}"} ${snapshot.processingTime.buckets[bound] ?? 0}`);
  }
  lines.push(`${histogram}_sum ${snapshot.processingTime.sum}`);
  lines.push(`${histogram}_count ${snapshot.processingTime.count}`);

  const labels = Object.entries(info)
    .map(([key, value]) => `${key}="${escapeLabelValue(value)}"`)
    .join(",");
  lines.push("# HELP gpgga_cot_relay_info Application information", "# TYPE gpgga_cot_relay_info gauge");
  lines.push(`gpgga_cot_relay_info${labels ? `{${labels}}` : ""} 1`);

  return `${lines.join("\n")}\n`;
}
