/**
 * Synth Engine - Protocol Parameters
 *
 * Ratios and percentages are integer percent (150 = 150%).
 * Prices are 8-decimal fixed point (100_000_000 = 1.0).
 * Durations are counted in blocks of the logical clock.
 */

/** Collateral ratio required to mint */
export const MIN_COLLATERAL_RATIO = 150n;

/** Positions below this health can be liquidated */
export const LIQUIDATION_THRESHOLD = 120n;

/** Liquidator reward on top of the covered collateral value (percent) */
export const LIQUIDATION_BONUS = 10n;

/** Charged against the liquidated position's collateral (percent) */
export const LIQUIDATION_PENALTY = 5n;

/** A price older than this many blocks is stale */
export const ORACLE_STALENESS_LIMIT = 100n;

/** Minimum confidence (percent) an oracle must attach to a price */
export const MIN_ORACLE_CONFIDENCE = 60n;
export const MAX_ORACLE_CONFIDENCE = 100n;

/** Blocks that must elapse between a position's last interaction and a mint */
export const COOLDOWN_BLOCKS = 10n;

/** 50 bps = 0.5% */
export const MINTING_FEE_BPS = 50n;

/** A diversified position may hold at most this share of total collateral (percent) */
export const MAX_POSITION_PERCENTAGE = 10n;

export const MAX_DIVERSIFIED_ASSETS = 5;
export const MIN_AVG_RISK_SCORE = 50n;
export const DIVERSIFICATION_BONUS_HIGH = 10n;
export const DIVERSIFICATION_BONUS_LOW = 5n;

/** Diversified mints with a bonus above this are flagged liquidation-protected */
export const PROTECTION_BONUS_THRESHOLD = 8n;

export const INITIAL_CREDIBILITY_SCORE = 100n;
