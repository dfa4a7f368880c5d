#!/usr/bin/env node
import { defaults } from './state/params';
import { computeWaterBudget } from './model';
import { printReport } from './ui/report';

function main(): void {
  const budget = computeWaterBudget(defaults);
  printReport(budget);
}

main();
