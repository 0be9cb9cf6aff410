import { Hono } from "hono";
import { metrics } from "../monitoring/metrics";

const metricsRoutes = new Hono();

// Prometheus-compatible metrics endpoint
metricsRoutes.get("/", (c) => {
  return c.text(metrics.exportPrometheus(), 200, {
    "Content-Type": "text/plain; version=0.0.4",
  });
});

metricsRoutes.get("/json", (c) => {
  return c.json(metrics.exportJSON());
});

metricsRoutes.get("/summary", (c) => {
  return c.json(metrics.getSummary());
});

metricsRoutes.get("/health", (c) => {
  const summary = metrics.getSummary();

  const isHealthy =
    summary.errorRate < 10 && // Less than 10% errors
    summary.avgRequestDuration < 1000; // Avg response < 1s

  return c.json(
    {
      status: isHealthy ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      metrics: summary,
    },
    isHealthy ? 200 : 503,
  );
});

metricsRoutes.get("/ready", (c) => {
  return c.json({
    status: "ready",
    timestamp: new Date().toISOString(),
  });
});

metricsRoutes.get("/live", (c) => {
  return c.json({
    status: "alive",
    timestamp: new Date().toISOString(),
  });
});

export default metricsRoutes;
