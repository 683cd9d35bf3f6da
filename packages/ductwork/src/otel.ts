/**
 * ductwork/otel
 *
 * OpenTelemetry instrumentation for any primitive. Behaviour is unchanged;
 * each call additionally opens a span and records execution metrics.
 */

import {
  context as otelContext,
  metrics,
  trace,
  isSpanContextValid,
  SpanStatusCode,
  TraceFlags,
  type Context as OtelContext,
  type Meter,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import type { Context } from "./context";
import { errorMessage } from "./errors";
import type { Primitive } from "./primitive";

export interface InstrumentOptions {
  /** @default trace.getTracer("ductwork") */
  tracer?: Tracer;
  /** @default metrics.getMeter("ductwork") */
  meter?: Meter;
  /** Span and metric name; defaults to the primitive's name */
  name?: string;
}

export const EXECUTIONS_METRIC = "ductwork.primitive.executions";
export const DURATION_METRIC = "ductwork.primitive.duration";

/**
 * The OTel context to start a span under. An active span wins; otherwise the
 * ductwork context's trace and span IDs are used when they are valid W3C IDs.
 */
function parentFor(context: Context): OtelContext {
  const active = otelContext.active();
  if (trace.getSpan(active) || !context.traceId || !context.spanId) return active;

  const spanContext = {
    traceId: context.traceId,
    spanId: context.spanId,
    traceFlags: TraceFlags.SAMPLED,
    isRemote: true,
  };
  return isSpanContextValid(spanContext) ? trace.setSpanContext(active, spanContext) : active;
}

/**
 * Wrap a primitive with tracing and metrics.
 *
 * The span is named `primitive.<name>` and carries the context's
 * `exportTraceAttributes()` plus `primitive.kind` and `primitive.name`. The
 * inner primitive receives a context copy whose `traceId`, `spanId` and
 * `parentSpanId` describe the new span; state and checkpoints stay shared.
 *
 * @example
 * ```typescript
 * import { trace } from "@opentelemetry/api";
 * import { instrument } from "ductwork/otel";
 *
 * const traced = instrument(pipeline, { tracer: trace.getTracer("checkout") });
 * ```
 */
export function instrument<I, O>(
  primitive: Primitive<I, O>,
  options: InstrumentOptions = {}
): Primitive<I, O> {
  const tracer = options.tracer ?? trace.getTracer("ductwork");
  const meter = options.meter ?? metrics.getMeter("ductwork");
  const name = options.name ?? primitive.name;

  const executions = meter.createCounter(EXECUTIONS_METRIC, {
    description: "Primitive executions by outcome",
  });
  const duration = meter.createHistogram(DURATION_METRIC, {
    description: "Primitive execution time",
    unit: "ms",
  });
  const metricAttributes = { "primitive.name": name, "primitive.kind": primitive.kind };

  return {
    kind: primitive.kind,
    name,
    execute(input: I, context: Context): Promise<O> {
      const attributes = {
        ...context.exportTraceAttributes(),
        "primitive.kind": primitive.kind,
        "primitive.name": name,
      };

      return tracer.startActiveSpan(
        `primitive.${name}`,
        { attributes },
        parentFor(context),
        async (span: Span): Promise<O> => {
          const startedAt = context.now();
          const { traceId, spanId } = span.spanContext();
          const traced = context.with({ traceId, spanId, parentSpanId: context.spanId });

          try {
            const output = await primitive.execute(input, traced);
            span.setStatus({ code: SpanStatusCode.OK });
            executions.add(1, { ...metricAttributes, status: "ok" });
            return output;
          } catch (error) {
            span.recordException(error instanceof Error ? error : String(error));
            span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) });
            executions.add(1, { ...metricAttributes, status: "error" });
            throw error;
          } finally {
            duration.record(context.now() - startedAt, metricAttributes);
            span.end();
          }
        }
      );
    },
  };
}
