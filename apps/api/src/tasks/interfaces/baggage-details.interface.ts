import { BaggagePriority } from '../baggage/baggage-priority.enum';

/**
 * Descriptive fields attached to a baggage processing task.
 * Stored as the task payload under `baggageDetails`; never mutated.
 */
export interface BaggageDetails {
  /** BAG-10000 … BAG-99999 */
  baggageId: string;

  /** FL-100 … FL-999 */
  flightNumber: string;

  destination: string;

  /** Formatted with one decimal, e.g. "18.4 kg" */
  weight: string;

  priority: BaggagePriority;
}
