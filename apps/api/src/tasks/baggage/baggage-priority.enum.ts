/** Handling priority printed on the baggage tag. */
export enum BaggagePriority {
  NORMAL = 'Normal',
  PRIORITY = 'Priority',
  FRAGILE = 'Fragile',
}
