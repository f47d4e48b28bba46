import { isNumber, isString } from '../validation';

export type ErrorConstructor<ErrorType extends Error> = new (
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  ...args: any[]
) => ErrorType;

export class WaymarkError extends Error {
  public static readonly Codes = {
    ValidationError: 400,
    IllegalStateError: 403,
    ConcurrencyError: 412,
    InternalServerError: 500,
  };

  public errorCode: number;

  constructor(
    options?: { errorCode: number; message?: string } | string | number,
  ) {
    const errorCode =
      options && typeof options === 'object' && 'errorCode' in options
        ? options.errorCode
        : isNumber(options)
          ? options
          : WaymarkError.Codes.InternalServerError;
    const message =
      options && typeof options === 'object' && 'message' in options
        ? options.message
        : isString(options)
          ? options
          : `Error with status code '${errorCode}' ocurred during workflow processing`;

    super(message);
    this.errorCode = errorCode;

    // 👇️ because we are extending a built-in class
    Object.setPrototypeOf(this, WaymarkError.prototype);
  }

  public static mapFrom(
    error: Error | { message?: string; errorCode?: number },
  ): WaymarkError {
    if (error instanceof WaymarkError) {
      return error;
    }

    return new WaymarkError({
      errorCode:
        'errorCode' in error &&
        error.errorCode !== undefined &&
        error.errorCode !== null
          ? error.errorCode
          : WaymarkError.Codes.InternalServerError,
      message: error.message ?? 'An unknown error occurred',
    });
  }

  public static isInstanceOf(
    error: unknown,
    errorCode?: (typeof WaymarkError.Codes)[keyof typeof WaymarkError.Codes],
  ): error is WaymarkError {
    return (
      typeof error === 'object' &&
      error !== null &&
      'errorCode' in error &&
      isNumber(error.errorCode) &&
      (errorCode === undefined || error.errorCode === errorCode)
    );
  }
}

export class ConcurrencyError extends WaymarkError {
  constructor(
    public current: string | undefined,
    public expected: string,
    message?: string,
  ) {
    super({
      errorCode: WaymarkError.Codes.ConcurrencyError,
      message:
        message ??
        `Expected position ${expected} does not match current ${current}`,
    });

    // 👇️ because we are extending a built-in class
    Object.setPrototypeOf(this, ConcurrencyError.prototype);
  }
}

export const isConcurrencyError = (error: unknown): error is ConcurrencyError =>
  error instanceof ConcurrencyError ||
  WaymarkError.isInstanceOf(error, WaymarkError.Codes.ConcurrencyError);

export class ValidationError extends WaymarkError {
  constructor(message?: string) {
    super({
      errorCode: WaymarkError.Codes.ValidationError,
      message: message ?? `Validation Error ocurred during workflow processing`,
    });

    // 👇️ because we are extending a built-in class
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class IllegalStateError extends WaymarkError {
  constructor(message?: string) {
    super({
      errorCode: WaymarkError.Codes.IllegalStateError,
      message: message ?? `Illegal State ocurred during workflow processing`,
    });

    // 👇️ because we are extending a built-in class
    Object.setPrototypeOf(this, IllegalStateError.prototype);
  }
}

const describe = (value: unknown): string => {
  if (typeof value === 'object' && value !== null) {
    if ('type' in value && isString(value.type)) return value.type;
    if ('status' in value && isString(value.status)) return value.status;
  }
  return String(value);
};

/**
 * Raised by `decide` when the workflow has no rule for the input in the current state.
 */
export class UnsupportedTransitionError<
  Input = unknown,
  State = unknown,
> extends IllegalStateError {
  constructor(
    public readonly input: Input,
    public readonly state: State,
    message?: string,
  ) {
    super(
      message ??
        `Input '${describe(input)}' is not supported in state '${describe(state)}'`,
    );

    // 👇️ because we are extending a built-in class
    Object.setPrototypeOf(this, UnsupportedTransitionError.prototype);
  }
}

/**
 * Raised by `evolve` when a recorded event cannot have happened in the given state.
 * It means the stored history disagrees with the workflow definition.
 */
export class ReplayInconsistencyError<
  WorkflowEventType = unknown,
  State = unknown,
> extends IllegalStateError {
  constructor(
    public readonly event: WorkflowEventType,
    public readonly state: State,
    message?: string,
  ) {
    super(
      message ??
        `Event '${describe(event)}' cannot be applied to state '${describe(state)}'`,
    );

    // 👇️ because we are extending a built-in class
    Object.setPrototypeOf(this, ReplayInconsistencyError.prototype);
  }
}

export type InvalidOperationReason =
  | 'WorkflowNotFound'
  | 'PositionNotFound'
  | 'NotAPendingCommand';

export class InvalidOperationError extends IllegalStateError {
  constructor(
    public readonly reason: InvalidOperationReason,
    message?: string,
  ) {
    super(message ?? `Invalid operation: ${reason}`);

    // 👇️ because we are extending a built-in class
    Object.setPrototypeOf(this, InvalidOperationError.prototype);
  }
}
