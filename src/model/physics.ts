import { KG_PER_TONNE } from './constants';
import type { Params } from './types';

/**
 * THE PHYSICS MODULE
 * Everything here is first-principles. One energy chain, start to finish:
 * orbital KE -> peak heating -> heat into the vehicle -> what the tiles
 * can't radiate -> water boiled off.
 */

// ½mv² - at 7.8 km/s this is a lot of joules
export function getKineticEnergy(params: Params): number {
  return 0.5 * params.vehicleMass * Math.pow(params.orbitalVelocity, 2);
}

export function getMaxHeatingEnergy(params: Params): number {
  return params.maxHeatingFrac * getKineticEnergy(params);
}

// Most of the energy goes into the shock layer, not the vehicle
export function getHeatLoad(params: Params): number {
  return params.heatFrac * getMaxHeatingEnergy(params);
}

// Radiative equilibrium: emitted power scales with T⁴, so running the tiles
// at 80% of max temperature only radiates 0.8⁴ ≈ 41% of the heat away
export function getTileHeatFraction(params: Params): number {
  return Math.pow(params.tileTempFrac, 4);
}

export function getAbsorbedFraction(params: Params): number {
  return 1 - getTileHeatFraction(params);
}

export function getSteamEnergy(params: Params): number {
  return getAbsorbedFraction(params) * getHeatLoad(params);
}

export function getWaterMassKg(params: Params): number {
  return getSteamEnergy(params) / params.latentHeat;
}

export function kgToTonnes(kg: number): number {
  return kg / KG_PER_TONNE;
}
