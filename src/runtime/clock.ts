/**
 * Zeitquelle der Pipeline. Alle zeitlichen Prüfungen laufen über eine Clock,
 * damit Backfills und Tests eine feste Zeit vorgeben können.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
