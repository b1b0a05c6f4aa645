import type { BandTable, ScoreBand } from "../config.js";

const bandContains = (band: ScoreBand, value: number): boolean =>
  (band.min === undefined || value >= band.min) && (band.max === undefined || value <= band.max);

/** Points of the first band containing `value`, or the table's fallback. */
export const scoreBand = (table: BandTable, value: number): number =>
  table.bands.find((band) => bandContains(band, value))?.points ?? table.fallback;

export const maxBandPoints = (table: BandTable): number =>
  table.bands.reduce((max, band) => Math.max(max, band.points), table.fallback);
