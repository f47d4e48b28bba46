import { ConcurrencyError } from '../errors';
import type { WorkflowStreamPosition } from './workflowMessage';

export type ExpectedStreamPosition =
  | WorkflowStreamPosition
  | ExpectedStreamPositionGeneral;

export type ExpectedStreamPositionGeneral =
  | 'STREAM_EXISTS'
  | 'STREAM_DOES_NOT_EXIST'
  | 'NO_CONCURRENCY_CHECK';

export const STREAM_EXISTS = 'STREAM_EXISTS' satisfies ExpectedStreamPosition;
export const STREAM_DOES_NOT_EXIST =
  'STREAM_DOES_NOT_EXIST' satisfies ExpectedStreamPosition;
export const NO_CONCURRENCY_CHECK =
  'NO_CONCURRENCY_CHECK' satisfies ExpectedStreamPosition;

/**
 * Position of an empty (or not existing) stream.
 */
export const WorkflowStreamDefaultPosition = 0n;

export const matchesExpectedPosition = (
  current: WorkflowStreamPosition,
  expected: ExpectedStreamPosition,
): boolean => {
  if (expected === NO_CONCURRENCY_CHECK) return true;

  if (expected === STREAM_DOES_NOT_EXIST)
    return current === WorkflowStreamDefaultPosition;

  if (expected === STREAM_EXISTS)
    return current !== WorkflowStreamDefaultPosition;

  return current === expected;
};

export const assertExpectedPositionMatchesCurrent = (
  current: WorkflowStreamPosition,
  expected: ExpectedStreamPosition | undefined,
): void => {
  expected ??= NO_CONCURRENCY_CHECK;

  if (!matchesExpectedPosition(current, expected))
    throw new ExpectedPositionConflictError(current, expected);
};

export class ExpectedPositionConflictError extends ConcurrencyError {
  constructor(
    current: WorkflowStreamPosition,
    expected: ExpectedStreamPosition,
  ) {
    super(current.toString(), expected.toString());

    // 👇️ because we are extending a built-in class
    Object.setPrototypeOf(this, ExpectedPositionConflictError.prototype);
  }
}
