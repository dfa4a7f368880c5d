/**
 * REENTRY CONSTANTS
 *
 * Not much here. The interesting numbers live in state/params.ts
 * because they're the ones worth arguing about.
 */

export const KG_PER_TONNE = 1000;
