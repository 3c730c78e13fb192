/**
 * Power-class colour palette for turbines.
 * Colours are RGB hex values; green for small machines through red for the largest.
 */

export type PowerClass = 'small' | 'medium' | 'large' | 'very_large';

export interface PowerBand {
  powerClass: PowerClass;
  /** Exclusive upper bound in kW. */
  belowKw: number;
  color: number;
}

const OPEN_BAND: PowerBand = { powerClass: 'very_large', belowKw: Infinity, color: 0xf26659 };

/** Ordered by ascending upper bound; the last band is open-ended. */
export const POWER_BANDS: readonly PowerBand[] = [
  { powerClass: 'small', belowKw: 1000, color: 0x66d966 },
  { powerClass: 'medium', belowKw: 3000, color: 0xe6e666 },
  { powerClass: 'large', belowKw: 5000, color: 0xf2a64d },
  OPEN_BAND,
];

export function powerBand(powerKw: number): PowerBand {
  for (const band of POWER_BANDS) {
    if (powerKw < band.belowKw) return band;
  }
  // NaN compares false against every bound.
  return OPEN_BAND;
}

/**
 * Get the RGB components for a rated power (0-1 range).
 * Returns [r, g, b] for instance colour usage.
 */
export function powerColorRGB(powerKw: number): [number, number, number] {
  const hex = powerBand(powerKw).color;
  return [
    ((hex >> 16) & 0xff) / 255,
    ((hex >> 8) & 0xff) / 255,
    (hex & 0xff) / 255,
  ];
}
