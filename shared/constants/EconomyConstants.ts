// ============================================================================
// EconomyConstants.ts
// In-match credit flow: round rewards, objective and kill bonuses, the loss
// streak catch-up, and the buy ladder used when simulating purchases.
// ============================================================================

// ----------------------------------------------------------------------------
// IN-MATCH ECONOMY
// Winning pays a flat amount. Losing pays a base that grows with the loss
// streak so a team that keeps losing can still afford a full buy.
// ----------------------------------------------------------------------------

/** Credits every player starts the match (and each half) with. */
export const STARTING_CREDITS: number = 800;

/** Hard cap on carried credits. Earnings past it are lost. */
export const MAX_CREDITS: number = 9000;

/** Credits every player of the winning team receives. */
export const ROUND_WIN_REWARD: number = 3000;

/** Loss reward on the first loss of a streak. */
export const LOSS_BASE_REWARD: number = 1900;

/** Extra loss reward per previous consecutive loss. */
export const LOSS_STREAK_STEP: number = 500;

/** Previous consecutive losses counted toward the loss reward. */
export const LOSS_STREAK_CAP: number = 4;

/** Bonus for the player who planted the spike, win or lose. */
export const SPIKE_PLANT_BONUS: number = 300;

/** Bonus for the player who defused the spike. */
export const SPIKE_DEFUSE_BONUS: number = 300;

/** Credits per kill. */
export const KILL_REWARD: number = 200;

/** Credits every player is set to at the start of each overtime round. */
export const OVERTIME_CREDITS: number = 5000;

// ----------------------------------------------------------------------------
// BUY LADDER
// Thresholds the buy simulation walks from the top down. The first rung a
// player can afford decides the purchase.
// ----------------------------------------------------------------------------

export const BUY_LADDER = {
  /** Rifle (Vandal or Phantom, even odds) plus heavy shield */
  fullBuy: 3900,

  /** Spectre or Bulldog plus light shield */
  halfBuy: 2400,

  /** Chance a half buy picks the Spectre */
  halfBuySpectreChance: 0.7,

  /** Sheriff or Ghost */
  ecoBuy: 950,

  /** Chance an eco buy picks the Sheriff */
  ecoSheriffChance: 0.6,

  /** Credits needed before the pistol for an eco buy to add a light shield */
  ecoShieldThreshold: 1400,
} as const;
