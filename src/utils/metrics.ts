// ============================================================================
// METRICS COLLECTION
// In-process counters, histograms and gauges rendered in Prometheus text format
// ============================================================================

import { config } from "../config/index.js";

interface Counter {
  value: number;
  labels: Map<string, number>;
}

interface Histogram {
  count: number;
  sum: number;
  buckets: Map<number, number>;
}

interface Gauge {
  value: number;
}

const counters = new Map<string, Counter>();
const histograms = new Map<string, Histogram>();
const gauges = new Map<string, Gauge>();

const DEFAULT_BUCKETS = [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60];

function getOrCreateCounter(name: string): Counter {
  let counter = counters.get(name);
  if (!counter) {
    counter = { value: 0, labels: new Map() };
    counters.set(name, counter);
  }
  return counter;
}

function getOrCreateHistogram(name: string): Histogram {
  let histogram = histograms.get(name);
  if (!histogram) {
    histogram = {
      count: 0,
      sum: 0,
      buckets: new Map(DEFAULT_BUCKETS.map((b) => [b, 0])),
    };
    histograms.set(name, histogram);
  }
  return histogram;
}

function getOrCreateGauge(name: string): Gauge {
  let gauge = gauges.get(name);
  if (!gauge) {
    gauge = { value: 0 };
    gauges.set(name, gauge);
  }
  return gauge;
}

function labelKey(labels: Record<string, string>): string {
  return Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`)
    .join(",");
}

export const metrics = {
  incCounter(name: string, labels?: Record<string, string>, value = 1): void {
    if (!config.metrics.enabled) return;

    const counter = getOrCreateCounter(name);
    counter.value += value;

    if (labels) {
      const key = labelKey(labels);
      counter.labels.set(key, (counter.labels.get(key) || 0) + value);
    }
  },

  observeHistogram(name: string, value: number): void {
    if (!config.metrics.enabled) return;

    const histogram = getOrCreateHistogram(name);
    histogram.count++;
    histogram.sum += value;

    for (const bucket of DEFAULT_BUCKETS) {
      if (value <= bucket) {
        histogram.buckets.set(bucket, (histogram.buckets.get(bucket) || 0) + 1);
      }
    }
  },

  incGauge(name: string, value = 1): void {
    if (!config.metrics.enabled) return;

    const gauge = getOrCreateGauge(name);
    gauge.value += value;
  },

  decGauge(name: string, value = 1): void {
    this.incGauge(name, -value);
  },

  // --------------------------------------------------------------------------
  // CONVENIENCE METHODS
  // --------------------------------------------------------------------------

  recordHttpRequest(method: string, route: string, statusCode: number, duration: number): void {
    this.incCounter("http_requests_total", { method, route, status: String(statusCode) });
    this.observeHistogram("http_request_duration_seconds", duration / 1000);
  },

  recordUpstreamCall(operation: string, result: "success" | "error", duration: number): void {
    this.incCounter("capcorn_requests_total", { operation, result });
    this.observeHistogram("capcorn_request_duration_seconds", duration / 1000);
  },

  /**
   * Record the window outcomes of one sweep search
   */
  recordSweep(succeeded: number, failed: number, optionsFound: number): void {
    this.incCounter("sweep_searches_total");
    this.incCounter("sweep_windows_total", { result: "success" }, succeeded);
    this.incCounter("sweep_windows_total", { result: "error" }, failed);
    this.incCounter("sweep_options_found_total", undefined, optionsFound);
  },

  recordReservation(status: "success" | "failed"): void {
    this.incCounter("reservations_total", { status });
  },

  httpRequestsInFlight: {
    inc(): void {
      metrics.incGauge("http_requests_in_flight");
    },
    dec(): void {
      metrics.decGauge("http_requests_in_flight");
    },
  },

  // --------------------------------------------------------------------------
  // EXPORT METHODS
  // --------------------------------------------------------------------------

  getMetrics(): string {
    const lines: string[] = [];

    for (const [name, counter] of counters) {
      lines.push(`# TYPE ${name} counter`);
      if (counter.labels.size === 0) {
        lines.push(`${name} ${counter.value}`);
      } else {
        for (const [labelStr, value] of counter.labels) {
          lines.push(`${name}{${labelStr}} ${value}`);
        }
      }
    }

    for (const [name, histogram] of histograms) {
      lines.push(`# TYPE ${name} histogram`);
      for (const [bucket, count] of histogram.buckets) {
        lines.push(`${name}_bucket{le="${bucket}"} ${count}`);
      }
      lines.push(`${name}_bucket{le="+Inf"} ${histogram.count}`);
      lines.push(`${name}_sum ${histogram.sum}`);
      lines.push(`${name}_count ${histogram.count}`);
    }

    for (const [name, gauge] of gauges) {
      lines.push(`# TYPE ${name} gauge`);
      lines.push(`${name} ${gauge.value}`);
    }

    return lines.join("\n");
  },

  getContentType(): string {
    return "text/plain; version=0.0.4; charset=utf-8";
  },

  /**
   * Reset all metrics (for testing)
   */
  reset(): void {
    counters.clear();
    histograms.clear();
    gauges.clear();
  },
};
