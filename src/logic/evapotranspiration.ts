export interface Et0Input {
  /** Daily temperature, °C. */
  tempC: number;
  /** Incoming shortwave radiation, MJ/m²/day. */
  radiationMj: number;
  /** Wind speed at 2 m, m/s. */
  windMs: number;
  altitudeM?: number;
}

const ALBEDO = 0.23;
const ASSUMED_HUMIDITY = 0.75;

/**
 * Simplified FAO-56 Penman-Monteith reference evapotranspiration, mm/day,
 * rounded to 2 decimals. Used only when the provider does not supply ET0.
 * Soil heat flux is ignored and actual vapour pressure is taken as 75 % of saturation.
 */
export function estimateReferenceEt0(input: Et0Input): number {
  const { tempC: t, radiationMj, windMs } = input;
  const altitude = input.altitudeM ?? 150;

  const netRadiation = (1 - ALBEDO) * radiationMj * 0.408;
  const pressure = 101.3 * Math.pow((293 - 0.0065 * altitude) / 293, 5.26);
  const saturation = 0.6108 * Math.exp((17.27 * t) / (t + 237.3));
  const slope = (4098 * saturation) / Math.pow(t + 237.3, 2);
  const psychrometric = 0.665e-3 * pressure;
  const actual = saturation * ASSUMED_HUMIDITY;

  const numerator =
    0.408 * slope * netRadiation + psychrometric * (900 / (t + 273)) * windMs * (saturation - actual);
  const denominator = slope + psychrometric * (1 + 0.34 * windMs);
  const et0 = numerator / denominator;
  if (!Number.isFinite(et0)) return 0;
  return Math.round(Math.max(et0, 0) * 100) / 100;
}

export function kmhToMs(kmh: number): number {
  return kmh / 3.6;
}
