import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatSci, formatFloat, formatPercent, formatWhole, formatUsd, formatReport, printReport } from '../src/ui/report';
import { computeWaterBudget } from '../src/model/computeAll';
import { defaults } from '../src/state/params';

describe('Formatters', () => {
  it('scientific notation pads the exponent to two digits', () => {
    expect(formatSci(3.6504e12)).toBe('3.65e+12');
    expect(formatSci(6465588479.999999)).toBe('6.47e+09');
    expect(formatSci(1.2e-5)).toBe('1.20e-05');
    expect(formatSci(0)).toBe('0.00e+00');
  });

  it('scientific notation passes non-finite values through', () => {
    expect(formatSci(Infinity)).toBe('Infinity');
    expect(formatSci(-Infinity)).toBe('-Infinity');
    expect(formatSci(NaN)).toBe('NaN');
  });

  it('floats print shortest digits, whole numbers with .0', () => {
    expect(formatFloat(0.01)).toBe('0.01');
    expect(formatFloat(2)).toBe('2.0');
  });

  it('percent keeps the raw product of the fraction and 100', () => {
    expect(formatPercent(0.3)).toBe('30.000000000000004');
    expect(formatPercent(0.5)).toBe('50.0');
    expect(formatPercent(0.125)).toBe('12.5');
  });

  it('whole numbers round halves to even', () => {
    expect(formatWhole(2.5)).toBe('2');
    expect(formatWhole(3.5)).toBe('4');
    expect(formatWhole(0.5)).toBe('0');
    expect(formatWhole(2.86)).toBe('3');
    expect(formatWhole(2.4)).toBe('2');
    expect(formatWhole(0)).toBe('0');
  });

  it('usd is thousands-separated', () => {
    expect(formatUsd(500000)).toBe('$500,000 USD');
    expect(formatUsd(0)).toBe('$0 USD');
  });
});

describe('Report', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('default report', () => {
    expect(formatReport(computeWaterBudget(defaults))).toEqual([
      'Total kinetic energy: 3.65e+12 J',
      'KE during max heating (30.000000000000004%): 1.10e+12 J',
      'Heat during max heating (heat_fraction 0.01): 1.10e+10 J',
      'Fraction absorbed by water: 0.59',
      'Energy to steam: 6.47e+09 J',
      'Required water mass: 3 metric tonnes',
      'Number of flights needed: 1',
      'Total cost to deliver water to orbit: $500,000 USD',
      'Reentries supplied per launch (including freighter): 52'
    ]);
  });

  it('no-water report says so instead of dividing by zero', () => {
    const lines = formatReport(computeWaterBudget({ ...defaults, tileTempFrac: 1.0 }));
    expect(lines[3]).toBe('Fraction absorbed by water: 0.00');
    expect(lines[4]).toBe('Energy to steam: 0.00e+00 J');
    expect(lines[5]).toBe('Required water mass: 0 metric tonnes');
    expect(lines[6]).toBe('Number of flights needed: 0');
    expect(lines[7]).toBe('Total cost to deliver water to orbit: $0 USD');
    expect(lines[8]).toBe('Reentries supplied per launch (including freighter): unlimited (no water required)');
  });

  it('half-tonne water mass rounds to even in the report', () => {
    // ½ × 5 × 1000² J, all of it boiled at 1000 J/kg: exactly 2.5 t
    const lines = formatReport(computeWaterBudget({
      ...defaults,
      vehicleMass: 5,
      orbitalVelocity: 1000,
      maxHeatingFrac: 1,
      heatFrac: 1,
      tileTempFrac: 0,
      latentHeat: 1000
    }));
    expect(lines[5]).toBe('Required water mass: 2 metric tonnes');
  });

  it('running twice prints the same thing', () => {
    expect(formatReport(computeWaterBudget(defaults))).toEqual(formatReport(computeWaterBudget(defaults)));
  });

  it('printReport writes nine lines to the console', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    printReport(computeWaterBudget(defaults));
    expect(log).toHaveBeenCalledTimes(9);
    expect(log).toHaveBeenNthCalledWith(1, 'Total kinetic energy: 3.65e+12 J');
    expect(log).toHaveBeenLastCalledWith('Reentries supplied per launch (including freighter): 52');
  });
});
