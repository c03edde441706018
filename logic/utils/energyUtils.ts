/**
 * Energy Data Utilities
 */
import { TimeUnit, type EnergyData } from '../portalApi/types';

const TIME_UNIT_NAMES: Record<string, TimeUnit> = {
  day: TimeUnit.DAY,
  week: TimeUnit.WEEK,
};

/**
 * Parse a time unit name ("day" or "week", case-insensitive)
 */
export function parseTimeUnit(name: string): TimeUnit {
  const timeUnit = TIME_UNIT_NAMES[name.trim().toLowerCase()];
  if (timeUnit === undefined) {
    throw new Error(`Unsupported time unit "${name}", expected one of: ${Object.keys(TIME_UNIT_NAMES).join(', ')}`);
  }
  return timeUnit;
}

/**
 * Copy of the samples in chronological order
 */
export function sortByStartTime(energyData: EnergyData[]): EnergyData[] {
  return [...energyData].sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
}

/**
 * Total production (Wh) of one sample across all equipment
 */
export function totalEnergy(sample: EnergyData): number {
  let total = 0;
  for (const value of sample.values.values()) {
    total += value;
  }
  return total;
}
