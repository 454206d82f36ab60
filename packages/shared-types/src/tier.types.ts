// =====================================================
// Rating Tier Types
// =====================================================

/**
 * Named skill bracket derived from rating.
 * String-based enum so it survives JSON and SQL unchanged.
 */
export enum RatingTier {
  NEWCOMER = 'NEWCOMER',
  NOVICE = 'NOVICE',
  APPRENTICE = 'APPRENTICE',
  ADEPT = 'ADEPT',
  SKILLED = 'SKILLED',
  EXPERT = 'EXPERT',
  VETERAN = 'VETERAN',
  MASTER = 'MASTER',
  GRANDMASTER = 'GRANDMASTER',
  LEGEND = 'LEGEND',
}

export interface TierThreshold {
  tier: RatingTier;
  minRating: number;
  name: string;
}

// Ascending; a rating belongs to the last threshold it reaches.
export const TIER_THRESHOLDS: readonly TierThreshold[] = [
  { tier: RatingTier.NEWCOMER, minRating: 0, name: 'Newcomer' },
  { tier: RatingTier.NOVICE, minRating: 800, name: 'Novice' },
  { tier: RatingTier.APPRENTICE, minRating: 1000, name: 'Apprentice' },
  { tier: RatingTier.ADEPT, minRating: 1200, name: 'Adept' },
  { tier: RatingTier.SKILLED, minRating: 1400, name: 'Skilled' },
  { tier: RatingTier.EXPERT, minRating: 1600, name: 'Expert' },
  { tier: RatingTier.VETERAN, minRating: 1800, name: 'Veteran' },
  { tier: RatingTier.MASTER, minRating: 2000, name: 'Master' },
  { tier: RatingTier.GRANDMASTER, minRating: 2200, name: 'Grandmaster' },
  { tier: RatingTier.LEGEND, minRating: 2400, name: 'Legend' },
];

/**
 * Result of one rating update.
 *
 * Client UI flags:
 * - `promoted`/`demoted`: direction of a tier change, for animations
 */
export interface RatingUpdate {
  previousRating: number;
  newRating: number;
  delta: number;
  previousTier: RatingTier;
  newTier: RatingTier;
  tierChanged: boolean;
  promoted: boolean;
  demoted: boolean;
}
