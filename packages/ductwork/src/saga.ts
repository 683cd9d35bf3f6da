/**
 * ductwork/saga
 *
 * Pair a forward action with a best-effort local undo.
 *
 * @example
 * ```typescript
 * const reserve = saga(reserveInventory, releaseInventory, { trackStats: true });
 *
 * try {
 *   await reserve.execute(order, ctx);
 * } catch (error) {
 *   // always reserveInventory's error, even if releaseInventory also failed
 * }
 * ```
 */

import { errorType } from "./errors";
import {
  definePrimitive,
  eventBase,
  type KindedPrimitive,
  type Primitive,
} from "./primitive";

export interface SagaOptions {
  name?: string;
  /** Append a `SagaStatistic` to `state["sagaStatistics"]` after every call */
  trackStats?: boolean;
}

export interface SagaStatistic {
  primitive: string;
  success: boolean;
  compensated: boolean;
  /** Set when the compensation itself failed */
  compensationErrorType?: string;
}

export type SagaPrimitive<I, O> = KindedPrimitive<I, O, "saga"> & {
  readonly forward: Primitive<I, O>;
  readonly compensation: Primitive<I, unknown>;
};

/**
 * Run `forward`; when it rejects, run `compensation` with the same input and
 * context, then re-throw the forward error.
 *
 * A failing compensation is reported through the `saga_compensation_failed`
 * event and never replaces the forward error.
 */
export function saga<I, O>(
  forward: Primitive<I, O>,
  compensation: Primitive<I, unknown>,
  options: SagaOptions = {}
): SagaPrimitive<I, O> {
  const source = { kind: "saga", name: options.name ?? `saga(${forward.name})` };

  const primitive = definePrimitive({
    kind: "saga",
    name: source.name,
    checkpoints: true,
    execute: async (input: I, context): Promise<O> => {
      const record = (statistic: Omit<SagaStatistic, "primitive">) => {
        if (options.trackStats) {
          context.state.append("sagaStatistics", { primitive: forward.name, ...statistic });
        }
      };

      let forwardError: unknown;
      try {
        const output = await forward.execute(input, context);
        record({ success: true, compensated: false });
        return output;
      } catch (error) {
        forwardError = error;
      }

      context.emit({ ...eventBase(context, source), type: "saga_compensation_start", error: forwardError });
      context.checkpoint("saga.compensation.start");
      const startedAt = context.now();

      try {
        await compensation.execute(input, context);
        context.emit({
          ...eventBase(context, source),
          type: "saga_compensation_success",
          durationMs: context.now() - startedAt,
        });
        record({ success: false, compensated: true });
      } catch (compensationError) {
        context.emit({
          ...eventBase(context, source),
          type: "saga_compensation_failed",
          durationMs: context.now() - startedAt,
          error: compensationError,
          forwardError,
        });
        record({
          success: false,
          compensated: false,
          compensationErrorType: errorType(compensationError),
        });
      } finally {
        context.checkpoint("saga.compensation.end");
      }

      throw forwardError;
    },
  });

  return { ...primitive, forward, compensation };
}
