// Core parameter types for the reentry water model

export interface Params {
  // Vehicle & trajectory
  vehicleMass: number;       // Dry mass of the reentering stage (kg)
  orbitalVelocity: number;   // Velocity at entry interface (m/s)

  // Heating
  maxHeatingFrac: number;    // Share of KE dissipated during the peak heating phase (0-1)
  heatFrac: number;          // Share of that KE that reaches the vehicle as heat (0-1)
  tileTempFrac: number;      // Tile temperature as a fraction of max tolerable (0-1)

  // Coolant
  latentHeat: number;        // Latent heat of vaporization of water (J/kg)

  // Logistics
  payloadPerFlight: number;  // Payload to LEO per resupply flight (tonnes)
  costPerFlight: number;     // Propellant cost per resupply flight (USD)
}

export interface WaterBudget {
  params: Params;

  // Energy chain (J)
  kineticEnergy: number;
  maxHeatingEnergy: number;
  heatLoad: number;
  steamEnergy: number;

  // Radiative split
  tileHeatFrac: number;
  absorbedFrac: number;

  // Water
  waterMassKg: number;
  waterMassTonnes: number;

  // Logistics
  flights: number;
  totalCost: number;
  reentriesPerLaunch: number | null;  // null when no water is needed at all
}
