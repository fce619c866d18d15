/**
 * Money committed by a sponsor for a distance at a per-km rate. Callers
 * validate that both operands are positive.
 */
export const computePledgeTotal = (distance: number, amountPerKm: number): number => amountPerKm * distance;
