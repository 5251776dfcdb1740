export { MetricsCollector, sanitizeLabel } from "./metrics-collector.js";
export type { MetricsCollectorConfig } from "./metrics-collector.js";
