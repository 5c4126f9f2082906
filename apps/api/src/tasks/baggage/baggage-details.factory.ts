import { Injectable } from '@nestjs/common';
import { BaggageDetails } from '../interfaces/baggage-details.interface';
import { BaggagePriority } from './baggage-priority.enum';

export const BAGGAGE_DESTINATIONS = [
  'New York',
  'London',
  'Tokyo',
  'Paris',
  'Sydney',
] as const;

const PRIORITIES: readonly BaggagePriority[] = [
  BaggagePriority.NORMAL,
  BaggagePriority.PRIORITY,
  BaggagePriority.FRAGILE,
];

export interface BaggageDetailsOverrides {
  destination?: string;
  priority?: BaggagePriority;
}

/**
 * Generates the simulated baggage tag for a new task.
 *
 * `random` is injectable per call so tests can pin every field.
 */
@Injectable()
export class BaggageDetailsFactory {
  create(
    overrides: BaggageDetailsOverrides = {},
    random: () => number = Math.random,
  ): BaggageDetails {
    const baggageId = `BAG-${randomInt(10_000, 99_999, random)}`;
    const flightNumber = `FL-${randomInt(100, 999, random)}`;
    const destination = overrides.destination ?? pick(BAGGAGE_DESTINATIONS, random);
    const weight = `${(10 + random() * 20).toFixed(1)} kg`;
    const priority = overrides.priority ?? pick(PRIORITIES, random);

    return { baggageId, flightNumber, destination, weight, priority };
  }
}

function randomInt(min: number, max: number, random: () => number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick<T>(values: readonly T[], random: () => number): T {
  return values[Math.floor(random() * values.length)];
}
