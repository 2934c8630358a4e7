/**
 * Guarded calls into external capabilities (models and the vector store).
 */

import {
  CapabilityUnavailableError,
  NoDataError,
  RAGError,
  ValidationError,
  errorMessage,
  type CapabilityName,
} from './errors.js';
import { withRetry, withTimeout } from '../utils/async.js';
import type { CaptionProvider, ImageInput, QueryExpander } from './types.js';

export interface CapabilityPolicy {
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

export const DEFAULT_CAPABILITY_POLICY: CapabilityPolicy = {
  timeoutMs: 30_000,
  retries: 2,
  backoffMs: 500,
};

/**
 * Call a capability with a per-call timeout. Idempotent reads are retried;
 * writes pass `retry: false`. Failures surface as CapabilityUnavailableError.
 */
export async function callCapability<T>(
  capability: CapabilityName,
  operation: () => Promise<T>,
  policy: CapabilityPolicy,
  retry: boolean = true
): Promise<T> {
  const label = `[Capability:${capability}]`;
  const attempt = () => withTimeout(operation(), policy.timeoutMs, `${capability} call`);

  try {
    if (!retry) {
      return await attempt();
    }
    return await withRetry(attempt, {
      retries: policy.retries,
      backoffMs: policy.backoffMs,
      label,
      shouldRetry: (error) => !(error instanceof ValidationError || error instanceof NoDataError),
    });
  } catch (error) {
    if (error instanceof RAGError) {
      throw error;
    }
    throw new CapabilityUnavailableError(capability, errorMessage(error), { cause: error });
  }
}

/**
 * Captioning through the capability policy.
 */
export function guardedCaptioner(provider: CaptionProvider, policy: CapabilityPolicy): CaptionProvider {
  return {
    caption: (image: ImageInput) => callCapability('caption', () => provider.caption(image), policy),
  };
}

/**
 * Completion-backed expansion through the capability policy.
 */
export function guardedExpander(expander: QueryExpander, policy: CapabilityPolicy): QueryExpander {
  return {
    expandQuery: (query: string, count: number) =>
      callCapability('completion', () => expander.expandQuery(query, count), policy),
  };
}
