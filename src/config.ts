import {
  createLogger,
  isLogThreshold,
  type Logger,
  type LogThreshold,
} from "./logger.ts";

/** Environment variable holding the default log threshold. */
export const LOG_LEVEL_ENV = "CHARSET_CONFORMANCE_LOG_LEVEL";

const DEFAULT_LOG_THRESHOLD: LogThreshold = "warn";

/**
 * Options accepted by the conformance checks.
 */
export interface ConformanceOptions {
  /** Input mutabilities to exercise, in order; `true` means read-only. */
  readOnlyVariants?: readonly boolean[];
  /**
   * Size of the incremental output area as a multiple of the input
   * capacity.
   */
  outputCapacityFactor?: number;
  logger?: Logger;
}

/**
 * Reads the log threshold from the environment, falling back to `warn` when
 * the variable is unset or holds an unknown level.
 */
export function loadLogThreshold(
  env: Readonly<Record<string, string | undefined>> = process.env,
): LogThreshold {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return isLogThreshold(raw) ? raw : DEFAULT_LOG_THRESHOLD;
}

let defaultLogger: Logger | undefined;

/** The logger used when no `logger` option is given. */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger("charset-conformance", {
    threshold: loadLogThreshold(),
  });
  return defaultLogger;
}

export const DEFAULT_OPTIONS: Readonly<
  Required<Omit<ConformanceOptions, "logger">>
> = Object.freeze({
  readOnlyVariants: Object.freeze([false, true]),
  outputCapacityFactor: 2,
});

/**
 * Fills in defaults and validates the options.
 */
export function resolveOptions(
  options: ConformanceOptions = {},
): Required<ConformanceOptions> {
  const readOnlyVariants = options.readOnlyVariants ??
    DEFAULT_OPTIONS.readOnlyVariants;
  if (readOnlyVariants.length === 0) {
    throw new RangeError("readOnlyVariants must not be empty");
  }
  const outputCapacityFactor = options.outputCapacityFactor ??
    DEFAULT_OPTIONS.outputCapacityFactor;
  if (!Number.isInteger(outputCapacityFactor) || outputCapacityFactor <= 0) {
    throw new RangeError(
      `outputCapacityFactor must be a positive integer. Got ${outputCapacityFactor}`,
    );
  }
  return {
    readOnlyVariants,
    outputCapacityFactor,
    logger: options.logger ?? getDefaultLogger(),
  };
}
