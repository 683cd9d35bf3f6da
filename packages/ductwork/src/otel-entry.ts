/**
 * ductwork/otel
 *
 * OpenTelemetry integration: a span and execution metrics per primitive call.
 *
 * @example
 * ```typescript
 * import { instrument } from 'ductwork/otel';
 * import { trace, metrics } from '@opentelemetry/api';
 *
 * const traced = instrument(pipeline, {
 *   tracer: trace.getTracer('checkout'),
 *   meter: metrics.getMeter('checkout'),
 * });
 * ```
 */

export {
  type InstrumentOptions,
  DURATION_METRIC,
  EXECUTIONS_METRIC,
  instrument,
} from "./otel";
