/**
 * Model index - everything the CLI and the tests pull from the model
 */

// Constants
export { KG_PER_TONNE } from './constants';

// Types
export type { Params, WaterBudget } from './types';

// Physics functions
export {
  getKineticEnergy,
  getMaxHeatingEnergy,
  getHeatLoad,
  getTileHeatFraction,
  getAbsorbedFraction,
  getSteamEnergy,
  getWaterMassKg,
  kgToTonnes
} from './physics';

// Logistics functions
export {
  getFlightsNeeded,
  getDeliveryCost,
  getReentriesPerLaunch
} from './finance';

// Budget
export { computeWaterBudget } from './computeAll';
