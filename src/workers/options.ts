/**
 * Command worker tuning options.
 */
export interface ExecutorOptions {
  /**
   * Per-call timeout in milliseconds. The worker is restarted when it is exceeded.
   */
  requestTimeoutMs: number;
  /**
   * Maximum calls in flight; further calls are refused.
   */
  maxInflight: number;
  /**
   * Soft heap threshold in MB. An idle worker restarts after crossing it.
   */
  memorySoftLimitMb: number;
  /**
   * ! Hard heap threshold in MB. The worker restarts once it is reached, busy or not.
   */
  memoryHardLimitMb: number;
  /**
   * Memory telemetry interval in milliseconds.
   */
  memorySampleIntervalMs: number;
  /**
   * ! V8 old-generation limit per worker in MB.
   */
  maxOldGenerationSizeMb: number;
}

/**
 * Resolves worker options with gateway defaults.
 */
export function resolveExecutorOptions(overrides: Partial<ExecutorOptions> = {}): ExecutorOptions {
  const options = {
    requestTimeoutMs: overrides.requestTimeoutMs ?? 3000,
    maxInflight: overrides.maxInflight ?? 64,
    memorySoftLimitMb: overrides.memorySoftLimitMb ?? 96,
    memoryHardLimitMb: overrides.memoryHardLimitMb ?? 128,
    memorySampleIntervalMs: overrides.memorySampleIntervalMs ?? 5000,
    maxOldGenerationSizeMb: overrides.maxOldGenerationSizeMb ?? 160,
  };

  if (options.memorySoftLimitMb > options.memoryHardLimitMb) {
    throw new Error('Invalid memory limits: soft limit exceeds hard limit');
  }

  return options;
}
