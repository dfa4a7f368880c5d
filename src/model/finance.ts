/**
 * Resupply logistics - turning tonnes of water into flights and dollars
 */

// Partial flights aren't a thing; 3 tonnes still costs a whole launch
export function getFlightsNeeded(waterTonnes: number, payloadPerFlight: number): number {
  if (waterTonnes <= 0) return 0;
  return Math.ceil(waterTonnes / payloadPerFlight);
}

export function getDeliveryCost(flights: number, costPerFlight: number): number {
  return flights * costPerFlight;
}

/**
 * How many reentries one freighter load of water covers (the freighter's own included)
 *
 * Returns null when no water is needed - the ratio has no finite value then.
 */
export function getReentriesPerLaunch(payloadPerFlight: number, waterTonnes: number): number | null {
  if (waterTonnes <= 0) return null;
  return Math.floor(payloadPerFlight / waterTonnes);
}
