import type { Params, WaterBudget } from './types';
import {
  getKineticEnergy,
  getMaxHeatingEnergy,
  getHeatLoad,
  getTileHeatFraction,
  getAbsorbedFraction,
  getSteamEnergy,
  getWaterMassKg,
  kgToTonnes
} from './physics';
import { getFlightsNeeded, getDeliveryCost, getReentriesPerLaunch } from './finance';

/**
 * Run the whole chain once for a set of params
 */
export function computeWaterBudget(params: Params): WaterBudget {
  const waterMassKg = getWaterMassKg(params);
  const waterMassTonnes = kgToTonnes(waterMassKg);
  const flights = getFlightsNeeded(waterMassTonnes, params.payloadPerFlight);

  return {
    params: { ...params },
    kineticEnergy: getKineticEnergy(params),
    maxHeatingEnergy: getMaxHeatingEnergy(params),
    heatLoad: getHeatLoad(params),
    steamEnergy: getSteamEnergy(params),
    tileHeatFrac: getTileHeatFraction(params),
    absorbedFrac: getAbsorbedFraction(params),
    waterMassKg,
    waterMassTonnes,
    flights,
    totalCost: getDeliveryCost(flights, params.costPerFlight),
    reentriesPerLaunch: getReentriesPerLaunch(params.payloadPerFlight, waterMassTonnes)
  };
}
