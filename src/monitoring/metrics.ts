// Prometheus-compatible metrics collection
// Tracks API requests, minting, purchases and sweeps

import type { Context, Next } from "hono";

type Labels = Record<string, string>;

export interface HistogramSummary {
  count: number;
  sum: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  min: number;
  max: number;
}

export interface MetricsSnapshot {
  timestamp: string;
  counters: Record<string, number>;
  gauges: Record<string, number>;
  histograms: Record<string, HistogramSummary>;
}

const MAX_SAMPLES = 1000;

export class MetricsCollector {
  private counters: Map<string, number> = new Map();
  private gauges: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();

  incrementCounter(name: string, value: number = 1, labels?: Labels): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  setGauge(name: string, value: number, labels?: Labels): void {
    this.gauges.set(this.makeKey(name, labels), value);
  }

  observe(name: string, value: number, labels?: Labels): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    if (values.length > MAX_SAMPLES) values.shift();
    this.histograms.set(key, values);
  }

  getCounter(name: string, labels?: Labels): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  private makeKey(name: string, labels?: Labels): string {
    if (!labels) return name;
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return `${name}{${labelStr}}`;
  }

  private splitKey(key: string): { base: string; labels: string } {
    const brace = key.indexOf("{");
    return brace === -1
      ? { base: key, labels: "" }
      : { base: key.slice(0, brace), labels: key.slice(brace) };
  }

  private percentile(values: number[], p: number): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)];
  }

  private summarize(values: number[]): HistogramSummary {
    const sum = values.reduce((a, b) => a + b, 0);
    return {
      count: values.length,
      sum,
      avg: values.length > 0 ? sum / values.length : 0,
      p50: this.percentile(values, 50),
      p95: this.percentile(values, 95),
      p99: this.percentile(values, 99),
      min: values.length > 0 ? Math.min(...values) : 0,
      max: values.length > 0 ? Math.max(...values) : 0,
    };
  }

  exportPrometheus(): string {
    const lines: string[] = [];
    const typed = new Set<string>();
    const declare = (base: string, type: string) => {
      if (typed.has(base)) return;
      typed.add(base);
      lines.push(`# TYPE ${base} ${type}`);
    };

    for (const [key, value] of this.counters.entries()) {
      declare(this.splitKey(key).base, "counter");
      lines.push(`${key} ${value}`);
    }

    for (const [key, value] of this.gauges.entries()) {
      declare(this.splitKey(key).base, "gauge");
      lines.push(`${key} ${value}`);
    }

    for (const [key, values] of this.histograms.entries()) {
      const { base, labels } = this.splitKey(key);
      const summary = this.summarize(values);
      declare(base, "summary");
      lines.push(`${base}_sum${labels} ${summary.sum}`);
      lines.push(`${base}_count${labels} ${summary.count}`);
      lines.push(`${base}_p50${labels} ${summary.p50}`);
      lines.push(`${base}_p95${labels} ${summary.p95}`);
      lines.push(`${base}_p99${labels} ${summary.p99}`);
    }

    return lines.join("\n") + "\n";
  }

  exportJSON(): MetricsSnapshot {
    const histograms: Record<string, HistogramSummary> = {};
    for (const [key, values] of this.histograms.entries()) {
      histograms[key] = this.summarize(values);
    }
    return {
      timestamp: new Date().toISOString(),
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms,
    };
  }

  getSummary() {
    let totalRequests = 0;
    let totalErrors = 0;
    let purchases = 0;
    let failedPurchases = 0;
    let assetsMinted = 0;

    for (const [key, value] of this.counters.entries()) {
      const { base } = this.splitKey(key);
      if (base === "http_requests_total") totalRequests += value;
      if (base === "http_errors_total") totalErrors += value;
      if (base === "assets_minted_total") assetsMinted += value;
      if (base === "purchases_total") {
        purchases += value;
        if (key.includes('status="failed"')) failedPurchases += value;
      }
    }

    const requestDurations: number[] = [];
    for (const [key, values] of this.histograms.entries()) {
      if (this.splitKey(key).base === "http_request_duration_ms") {
        requestDurations.push(...values);
      }
    }
    const durations = this.summarize(requestDurations);

    return {
      totalRequests,
      totalErrors,
      errorRate: totalRequests > 0 ? (totalErrors / totalRequests) * 100 : 0,
      assetsMinted,
      purchases,
      failedPurchases,
      avgRequestDuration: Math.round(durations.avg * 100) / 100,
      p95RequestDuration: durations.p95,
      p99RequestDuration: durations.p99,
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
  }
}

export const metrics = new MetricsCollector();

export function trackRequest(
  method: string,
  path: string,
  status: number,
  duration: number,
): void {
  const labels = { method, path, status: status.toString() };
  metrics.incrementCounter("http_requests_total", 1, labels);
  metrics.observe("http_request_duration_ms", duration, { method, path });
  if (status >= 400) {
    metrics.incrementCounter("http_errors_total", 1, labels);
  }
}

export function trackMint(category: string): void {
  metrics.incrementCounter("assets_minted_total", 1, { category });
}

export function trackPurchase(outcome: "success" | "failed", code?: string): void {
  metrics.incrementCounter("purchases_total", 1, {
    status: outcome,
    ...(code ? { code } : {}),
  });
}

export function trackSweep(outcome: "success" | "failed"): void {
  metrics.incrementCounter("stray_sweeps_total", 1, { status: outcome });
}

export function trackAvailableAssets(count: number): void {
  metrics.setGauge("assets_available", count);
}

export function metricsMiddleware() {
  return async (c: Context, next: Next) => {
    const start = performance.now();

    await next();

    trackRequest(
      c.req.method,
      c.req.path,
      c.res.status,
      performance.now() - start,
    );
  };
}
