import { NoRetries, type AsyncRetryOptions } from '../utils';
import {
  assertNonNegativeInteger,
  assertPositiveNumber,
} from '../validation';

export type WorkflowOutputProcessorConfig = {
  pollingIntervalInMs: number;
  retry: AsyncRetryOptions;
};

export const WorkflowOutputProcessorDefaultOptions: WorkflowOutputProcessorConfig =
  {
    pollingIntervalInMs: 1000,
    retry: NoRetries,
  };

export const WorkflowOutputProcessorEnvVariables = {
  pollingIntervalInMs: 'WAYMARK_POLLING_INTERVAL_MS',
  commandRetries: 'WAYMARK_COMMAND_RETRIES',
} as const;

type Environment = Record<string, string | undefined>;

const numberFrom = (value: string | undefined): number | undefined =>
  value === undefined || value.trim() === '' ? undefined : Number(value);

/**
 * Resolves the output processor settings.
 * Explicit options win over environment variables, which win over defaults.
 */
export const getWorkflowOutputProcessorConfig = (
  options: Partial<WorkflowOutputProcessorConfig> = {},
  env: Environment = process.env,
): WorkflowOutputProcessorConfig => {
  const pollingIntervalInMs =
    options.pollingIntervalInMs ??
    numberFrom(env[WorkflowOutputProcessorEnvVariables.pollingIntervalInMs]) ??
    WorkflowOutputProcessorDefaultOptions.pollingIntervalInMs;

  const commandRetries = numberFrom(
    env[WorkflowOutputProcessorEnvVariables.commandRetries],
  );

  return {
    pollingIntervalInMs: assertPositiveNumber(pollingIntervalInMs),
    retry:
      options.retry ??
      (commandRetries !== undefined
        ? { retries: assertNonNegativeInteger(commandRetries) }
        : WorkflowOutputProcessorDefaultOptions.retry),
  };
};
