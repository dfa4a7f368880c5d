import type { Params } from '../model/types';

/**
 * Default parameters - Starship upper stage coming home from LEO
 * Every estimate below is an editable literal; nothing reads flags or env.
 */
export const defaults: Params = {
  // Vehicle & trajectory
  vehicleMass: 120000, // kg - dry upper stage, ~120 t
  orbitalVelocity: 7800, // m/s - LEO

  // Heating - the bets
  maxHeatingFrac: 0.3, // ~30% of KE goes during the peak heating phase
  heatFrac: 0.01, // 1% reaches the vehicle; blunt-body reentries run 0.01-0.03, Shuttle sits at the low end
  tileTempFrac: 0.8, // run the tiles at 80% of what they can take

  // Coolant
  latentHeat: 2260000, // J/kg - water at the boiling point

  // Logistics
  payloadPerFlight: 150, // tonnes to LEO per flight
  costPerFlight: 500000 // USD - propellant only
};
