/**
 * ductwork/testing
 *
 * Deterministic primitive testing: scripted mocks, event recording and a
 * manual clock.
 *
 * @example
 * ```typescript
 * import { createMockPrimitive, createRecordingHandler } from 'ductwork/testing';
 *
 * const charge = createMockPrimitive<Order, Receipt>({ name: 'charge' }).throws(new Error('declined'));
 * const recorder = createRecordingHandler();
 * const ctx = createContext({ onEvent: recorder.handler });
 *
 * await expect(saga(charge, refund).execute(order, ctx)).rejects.toThrow('declined');
 * expect(recorder.types()).toContain('saga_compensation_success');
 * ```
 */

export {
  // Types
  type MockInvocation,
  type MockPrimitive,
  type MockPrimitiveOptions,
  type RecordingHandler,

  // Functions
  createMockPrimitive,
  createRecordingHandler,
  createTestClock,
} from "./testing";
