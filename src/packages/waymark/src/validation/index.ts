import { ValidationError } from '../errors';

export enum ValidationErrors {
  NOT_A_NONEMPTY_STRING = 'NOT_A_NONEMPTY_STRING',
  NOT_A_POSITIVE_NUMBER = 'NOT_A_POSITIVE_NUMBER',
  NOT_A_NONNEGATIVE_INTEGER = 'NOT_A_NONNEGATIVE_INTEGER',
  NOT_A_NONEMPTY_ARRAY = 'NOT_A_NONEMPTY_ARRAY',
}

export const isNumber = (val: unknown): val is number =>
  typeof val === 'number' && val === val;

export const isString = (val: unknown): val is string =>
  typeof val === 'string';

export const assertNotEmptyString = (value: unknown): string => {
  if (!isString(value) || value.length === 0) {
    throw new ValidationError(ValidationErrors.NOT_A_NONEMPTY_STRING);
  }
  return value;
};

export const assertPositiveNumber = (value: unknown): number => {
  if (!isNumber(value) || value <= 0) {
    throw new ValidationError(ValidationErrors.NOT_A_POSITIVE_NUMBER);
  }
  return value;
};

export const assertNonNegativeInteger = (value: unknown): number => {
  if (!isNumber(value) || !Number.isInteger(value) || value < 0) {
    throw new ValidationError(ValidationErrors.NOT_A_NONNEGATIVE_INTEGER);
  }
  return value;
};

export const assertNotEmptyArray = <T>(value: readonly T[]): readonly T[] => {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError(ValidationErrors.NOT_A_NONEMPTY_ARRAY);
  }
  return value;
};
