import { err, type Result } from 'neverthrow';

import { raceDeadline, type Deadline } from '../../../common/deadline.js';

import type { CompletionError } from './errors.js';
import type { CompletionProvider } from './ports.js';
import type { TimeoutError } from '../../../common/types/errors.js';

/**
 * Runs a completion against the remaining request budget.
 */
export async function completeWithin(
  provider: CompletionProvider,
  prompt: string,
  systemInstructions: string,
  deadline?: Deadline
): Promise<Result<string, CompletionError | TimeoutError>> {
  const call = provider.complete(prompt, systemInstructions);
  if (deadline === undefined) {
    return call;
  }
  const raced = await raceDeadline(call, deadline, 'completion');
  return raced.isErr() ? err(raced.error) : raced.value;
}
