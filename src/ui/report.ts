import type { WaterBudget } from '../model/types';

// toExponential drops the zero padding on the exponent: 3.65e+12 is fine, 1.20e-5 isn't
export function formatSci(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  const [mantissa, exponent] = value.toExponential(2).split('e');
  const sign = exponent.startsWith('-') ? '-' : '+';
  return `${mantissa}e${sign}${exponent.replace(/^[+-]/, '').padStart(2, '0')}`;
}

// Shortest round-trip digits, but whole numbers keep a trailing .0
export function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function formatPercent(frac: number): string {
  return formatFloat(frac * 100);
}

// Halves go to the even neighbour: 2.5 -> 2, 3.5 -> 4
export function formatWhole(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  const floor = Math.floor(value);
  const rest = value - floor;
  const rounded = rest > 0.5 || (rest === 0.5 && floor % 2 !== 0) ? floor + 1 : floor;
  return rounded.toFixed(0);
}

export function formatUsd(value: number): string {
  return '$' + value.toLocaleString('en-US', { maximumFractionDigits: 0 }) + ' USD';
}

export function formatReport(budget: WaterBudget): string[] {
  const { params } = budget;
  return [
    `Total kinetic energy: ${formatSci(budget.kineticEnergy)} J`,
    `KE during max heating (${formatPercent(params.maxHeatingFrac)}%): ${formatSci(budget.maxHeatingEnergy)} J`,
    `Heat during max heating (heat_fraction ${formatFloat(params.heatFrac)}): ${formatSci(budget.heatLoad)} J`,
    `Fraction absorbed by water: ${budget.absorbedFrac.toFixed(2)}`,
    `Energy to steam: ${formatSci(budget.steamEnergy)} J`,
    `Required water mass: ${formatWhole(budget.waterMassTonnes)} metric tonnes`,
    `Number of flights needed: ${budget.flights}`,
    `Total cost to deliver water to orbit: ${formatUsd(budget.totalCost)}`,
    `Reentries supplied per launch (including freighter): ${budget.reentriesPerLaunch?.toString() ?? 'unlimited (no water required)'}`
  ];
}

export function printReport(budget: WaterBudget): void {
  formatReport(budget).forEach((line) => console.log(line));
}
