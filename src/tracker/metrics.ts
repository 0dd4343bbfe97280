import { Counter, Gauge, Histogram, Registry } from "prom-client";

export const registry = new Registry();
registry.setDefaultLabels({ service: "mention-tracker" });

export const platformCollectionsTotal = new Counter({
  name: "tracker_platform_collections_total",
  help: "Per-platform collection outcomes",
  labelNames: ["platform", "mode", "status"] as const,
  registers: [registry],
});

export const collectorRetriesTotal = new Counter({
  name: "tracker_collector_retries_total",
  help: "Collector fetches retried after a transient failure",
  labelNames: ["platform"] as const,
  registers: [registry],
});

export const fetchLatencySeconds = new Histogram({
  name: "tracker_fetch_latency_seconds",
  help: "Latency of collector fetches, including a retry",
  labelNames: ["platform"] as const,
  buckets: [0.1, 0.5, 1, 2, 5, 10, 20, 60],
  registers: [registry],
});

export const collectDurationSeconds = new Histogram({
  name: "tracker_collect_duration_seconds",
  help: "Wall time of a full collect call",
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [registry],
});

export const cacheWriteFailuresTotal = new Counter({
  name: "tracker_cache_write_failures_total",
  help: "Cache writes that failed after a successful fetch",
  registers: [registry],
});

export const notificationsEmittedTotal = new Counter({
  name: "tracker_notifications_emitted_total",
  help: "Notification events emitted by the monitor",
  labelNames: ["platform"] as const,
  registers: [registry],
});

export const monitorCyclesTotal = new Counter({
  name: "tracker_monitor_cycles_total",
  help: "Monitor check cycles by result",
  labelNames: ["result"] as const,
  registers: [registry],
});

export const notifiedEntriesGauge = new Gauge({
  name: "tracker_notified_entries",
  help: "Entries currently held in the notified set",
  registers: [registry],
});

export const memoryUsageBytes = new Gauge({
  name: "tracker_memory_usage_bytes",
  help: "Resident set size (RSS) memory usage of the tracker",
  registers: [registry],
});
