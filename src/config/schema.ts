import { z } from 'zod';

import { ValidationError } from '../errors/app-error.js';
import { MAX_TIMER_DELAY_MS } from '../lib/timer-utils.js';
import { config } from './index.js';

const positiveInt = z.number().int().min(1);
const nonNegativeInt = z.number().int().min(0);
const durationMs = nonNegativeInt.max(MAX_TIMER_DELAY_MS);

export const dispatcherOptionsSchema = z.strictObject({
  workerCount: positiveInt
    .max(1024)
    .describe('Number of concurrent worker loops in the pool.'),
  queueCapacity: positiveInt.describe(
    'Bound on admitted requests waiting for a worker.'
  ),
  admissionLimit: positiveInt.describe(
    'Maximum number of in-flight requests (permits).'
  ),
  perRequestTimeoutMs: durationMs.describe(
    'Deadline applied when the caller gives none. 0 disables it.'
  ),
  shutdownGracePeriodMs: durationMs.describe(
    'Time allowed for draining before in-flight requests are aborted.'
  ),
  admissionPolicy: z
    .enum(['wait', 'reject'])
    .describe('Wait for a permit, or reject when the limit is reached.'),
  queueFullPolicy: z
    .enum(['reject', 'wait'])
    .describe('Reject at once on a full queue, or wait up to enqueueTimeoutMs.'),
  enqueueTimeoutMs: durationMs.describe(
    'How long a caller may wait for queue space under the wait policy.'
  ),
});

export type DispatcherOptions = z.infer<typeof dispatcherOptionsSchema>;

export function defaultDispatcherOptions(): DispatcherOptions {
  return { ...config.dispatcher };
}

export function resolveDispatcherOptions(
  overrides: Partial<DispatcherOptions> = {}
): DispatcherOptions {
  const result = dispatcherOptionsSchema.safeParse({
    ...defaultDispatcherOptions(),
    ...overrides,
  });

  if (!result.success) {
    throw new ValidationError(
      `Invalid dispatcher options: ${z.prettifyError(result.error)}`,
      {
        issues: result.error.issues.map((issue) => ({
          path: issue.path.map(String).join('.'),
          message: issue.message,
        })),
      }
    );
  }

  return result.data;
}
