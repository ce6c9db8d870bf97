/**
 * Prometheus Metrics
 *
 * Exposes limiter metrics in the text exposition format:
 * - Checks by action and result
 * - Violations and abuse blocks
 * - Counter store degradation
 */

import { serverLog } from "../logger";

interface Metric {
  name: string;
  help: string;
  labels: string[];
  values: Map<string, number>;
}

export const METRIC = {
  checks: "ratelimit_checks_total",
  violations: "ratelimit_violations_total",
  abuseBlocks: "ratelimit_abuse_blocks_total",
  storeDegradations: "ratelimit_store_degradations_total",
  storeDegraded: "ratelimit_store_degraded",
} as const;

export class MetricsRegistry {
  private counters: Map<string, Metric> = new Map();
  private gauges: Map<string, Metric> = new Map();

  constructor() {
    this.registerDefaultMetrics();
  }

  private registerDefaultMetrics() {
    this.registerCounter(METRIC.checks, "Rate limit checks", ["action", "result"]);
    this.registerCounter(METRIC.violations, "Rate limit violations recorded", ["action"]);
    this.registerCounter(METRIC.abuseBlocks, "Checks refused because the actor is blocked for abuse");
    this.registerCounter(METRIC.storeDegradations, "Shared counter store degradation episodes");
    this.registerGauge(METRIC.storeDegraded, "1 while the shared counter store is bypassed");
  }

  // Counter methods
  registerCounter(name: string, help: string, labels: string[] = []) {
    this.counters.set(name, { name, help, labels, values: new Map() });
  }

  incCounter(name: string, labels: Record<string, string> = {}, value: number = 1) {
    const counter = this.counters.get(name);
    if (!counter) {
      serverLog.warn({ name }, "Counter not found");
      return;
    }

    const labelKey = this.formatLabels(labels, counter.labels);
    const current = counter.values.get(labelKey) || 0;
    counter.values.set(labelKey, current + value);
  }

  getCounter(name: string, labels: Record<string, string> = {}): number {
    const counter = this.counters.get(name);
    if (!counter) return 0;
    return counter.values.get(this.formatLabels(labels, counter.labels)) || 0;
  }

  // Gauge methods
  registerGauge(name: string, help: string, labels: string[] = []) {
    this.gauges.set(name, { name, help, labels, values: new Map() });
  }

  setGauge(name: string, labels: Record<string, string> = {}, value: number) {
    const gauge = this.gauges.get(name);
    if (!gauge) {
      serverLog.warn({ name }, "Gauge not found");
      return;
    }

    gauge.values.set(this.formatLabels(labels, gauge.labels), value);
  }

  // Format labels for storage key
  private formatLabels(labels: Record<string, string>, expectedLabels: string[]): string {
    const parts = expectedLabels.map((label) => `${label}="${escapeLabel(labels[label] || "")}"`);
    return parts.join(",");
  }

  // Generate Prometheus exposition format
  generateMetrics(): string {
    const lines: string[] = [];

    for (const [type, metrics] of [["counter", this.counters], ["gauge", this.gauges]] as const) {
      for (const metric of metrics.values()) {
        lines.push(`# HELP ${metric.name} ${metric.help}`);
        lines.push(`# TYPE ${metric.name} ${type}`);

        if (metric.values.size === 0) {
          lines.push(`${metric.name} 0`);
        } else {
          for (const [labels, value] of metric.values) {
            lines.push(labels ? `${metric.name}{${labels}} ${value}` : `${metric.name} ${value}`);
          }
        }
        lines.push("");
      }
    }

    return lines.join("\n");
  }
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}
