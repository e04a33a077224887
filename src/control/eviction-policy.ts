export const MAX_APPLYING_CHECKS = 5;

export type EvictionDecision = {
  checks: number;
  evict: boolean;
};

/**
 * A node that was asked to run but has not been seen applying gets another check.
 * Past the threshold it is dropped from the in-flight set.
 */
export function computeEvictionDecision(input: { previousChecks?: number }): EvictionDecision {
  const checks = Math.max(0, input.previousChecks ?? 0) + 1;
  return { checks, evict: checks > MAX_APPLYING_CHECKS };
}
