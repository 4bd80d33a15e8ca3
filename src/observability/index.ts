/**
 * Per-run metrics and tracing.
 */

export { MetricsCollector, type MetricPoint } from "./metrics.js";
export { Tracer, type Span } from "./tracer.js";
