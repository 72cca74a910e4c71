// Domain layer: Dice service contract
// Every random decision the engine makes goes through this interface

export interface DiceService {
  /** Roll dice notation ("NdM", "NdM+K", "NdM-K") and return the total including K. */
  roll(expr: string): number;

  /** A single unmodified d20. */
  d20(): number;

  /** One element of a non-empty array, chosen uniformly. */
  choice<T>(items: readonly T[]): T;
}

export interface DiceNotation {
  count: number;
  sides: number;
  modifier: number;
}
