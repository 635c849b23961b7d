export interface Interval {
  readonly start: number;
  readonly end: number; // inclusive: a successor must start strictly after it
  readonly cost: number;
}
