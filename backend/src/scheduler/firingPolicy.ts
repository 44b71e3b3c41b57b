/**
 * Fire only when the base fee satisfies both the item's own ceiling and the
 * global one. A per-item value can tighten the global bound, never loosen it.
 */
export function shouldFire(baseFeeGwei: number, itemMinBaseFeeGwei: number, maxFeeGwei: number): boolean {
  return baseFeeGwei <= itemMinBaseFeeGwei && baseFeeGwei <= maxFeeGwei;
}
