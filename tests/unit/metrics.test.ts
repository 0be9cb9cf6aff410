import { describe, test, expect } from "vitest";
import { MetricsCollector } from "../../src/monitoring/metrics";

describe("MetricsCollector - Unit Tests", () => {
  test("should export counters in Prometheus text format with sorted labels", () => {
    const metrics = new MetricsCollector();
    metrics.incrementCounter("purchases_total", 1, { status: "success" });
    metrics.incrementCounter("purchases_total", 1, { status: "success" });
    metrics.incrementCounter("purchases_total", 1, { status: "failed", code: "NOT_FOR_SALE" });

    expect(metrics.exportPrometheus()).toBe(
      [
        "# TYPE purchases_total counter",
        'purchases_total{status="success"} 2',
        'purchases_total{code="NOT_FOR_SALE",status="failed"} 1',
        "",
      ].join("\n"),
    );
  });

  test("should summarize purchases and requests", () => {
    const metrics = new MetricsCollector();
    metrics.incrementCounter("purchases_total", 3, { status: "success" });
    metrics.incrementCounter("purchases_total", 1, { status: "failed", code: "TRANSFER_FAILED" });
    metrics.incrementCounter("assets_minted_total", 2, { category: "GUN_SKIN" });
    metrics.incrementCounter("http_requests_total", 4, { method: "GET", path: "/", status: "200" });
    metrics.incrementCounter("http_errors_total", 1, { method: "GET", path: "/", status: "404" });
    metrics.observe("http_request_duration_ms", 10, { method: "GET", path: "/" });
    metrics.observe("http_request_duration_ms", 30, { method: "GET", path: "/" });

    expect(metrics.getSummary()).toEqual({
      totalRequests: 4,
      totalErrors: 1,
      errorRate: 25,
      assetsMinted: 2,
      purchases: 4,
      failedPurchases: 1,
      avgRequestDuration: 20,
      p95RequestDuration: 30,
      p99RequestDuration: 30,
    });
  });

  test("should report histogram summaries in JSON", () => {
    const metrics = new MetricsCollector();
    metrics.observe("latency_ms", 5);
    metrics.observe("latency_ms", 15);
    metrics.setGauge("assets_available", 3);

    const snapshot = metrics.exportJSON();
    expect(snapshot.gauges).toEqual({ assets_available: 3 });
    expect(snapshot.histograms.latency_ms).toEqual({
      count: 2,
      sum: 20,
      avg: 10,
      p50: 5,
      p95: 15,
      p99: 15,
      min: 5,
      max: 15,
    });
  });

  test("should clear everything on reset", () => {
    const metrics = new MetricsCollector();
    metrics.incrementCounter("stray_sweeps_total", 1, { status: "success" });
    metrics.reset();

    expect(metrics.getCounter("stray_sweeps_total", { status: "success" })).toBe(0);
    expect(metrics.exportPrometheus()).toBe("\n");
  });
});
