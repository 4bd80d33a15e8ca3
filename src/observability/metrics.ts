/**
 * Metrics collection for one pipeline run.
 * A collector is created per run; nothing here is shared between runs.
 */

import { STAGE_ORDER, type StageType } from "../types/pipeline.js";

export interface MetricPoint {
  readonly name: string;
  readonly value: number;
  readonly labels: Readonly<Record<string, string>>;
}

export class MetricsCollector {
  private readonly points: MetricPoint[] = [];

  recordDuration(stageType: StageType, durationMs: number): void {
    this.points.push({ name: "stage_duration_ms", value: durationMs, labels: { stage: stageType } });
  }

  increment(name: string, value = 1, labels: Record<string, string> = {}): void {
    this.points.push({ name, value, labels });
  }

  getMetrics(): readonly MetricPoint[] {
    return [...this.points];
  }

  /**
   * Flat summary for PipelineResult metadata.
   *
   * Keys: `<stage>_ms` per recorded stage, `total_stage_ms` (sum of stage
   * durations), and the sum of every counter under its own name.
   */
  summarize(): Record<string, number> {
    const summary: Record<string, number> = {};
    let total = 0;

    for (const stage of STAGE_ORDER) {
      const durations = this.points.filter(
        (p) => p.name === "stage_duration_ms" && p.labels["stage"] === stage
      );
      if (durations.length === 0) continue;

      const sum = durations.reduce((acc, p) => acc + p.value, 0);
      summary[`${stage}_ms`] = sum;
      total += sum;
    }
    summary["total_stage_ms"] = total;

    for (const point of this.points) {
      if (point.name === "stage_duration_ms") continue;
      summary[point.name] = (summary[point.name] ?? 0) + point.value;
    }

    return summary;
  }
}
