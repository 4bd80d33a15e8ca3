/**
 * Span tracing for one pipeline run.
 * The tracer owns the run's trace ID; spans nest under the active span.
 */

import { generateSpanId, generateTraceId } from "../logging/index.js";
import type { SpanRecord } from "../types/pipeline.js";

export interface Span {
  readonly spanId: string;
  readonly traceId: string;
  readonly parentId: string | null;
  readonly name: string;
  readonly startTime: number;
  endTime: number | null;
  readonly attributes: Record<string, string>;
}

export class Tracer {
  readonly traceId: string;
  private readonly spans: Span[] = [];
  private readonly stack: Span[] = [];

  constructor(traceId: string = generateTraceId()) {
    this.traceId = traceId;
  }

  startSpan(name: string, attributes: Record<string, string> = {}): Span {
    const parent = this.stack[this.stack.length - 1];
    const span: Span = {
      spanId: generateSpanId(),
      traceId: this.traceId,
      parentId: parent ? parent.spanId : null,
      name,
      startTime: Date.now(),
      endTime: null,
      attributes: { ...attributes },
    };
    this.spans.push(span);
    this.stack.push(span);
    return span;
  }

  endSpan(span: Span, attributes: Record<string, string> = {}): void {
    span.endTime = Date.now();
    Object.assign(span.attributes, attributes);

    const index = this.stack.lastIndexOf(span);
    if (index !== -1) {
      this.stack.splice(index);
    }
  }

  /**
   * Immutable snapshot of every span, in start order.
   */
  export(): SpanRecord[] {
    return this.spans.map((span) => ({
      spanId: span.spanId,
      traceId: span.traceId,
      parentId: span.parentId,
      name: span.name,
      startTime: span.startTime,
      endTime: span.endTime,
      durationMs: span.endTime === null ? null : span.endTime - span.startTime,
      attributes: { ...span.attributes },
    }));
  }
}
