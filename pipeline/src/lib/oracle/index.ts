import { OracleProvider } from '@minesite/shared';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_NORMALIZER_OPTIONS, type NormalizerOptions } from '../services/normalizer.js';
import type { OracleSettings } from '../validation.js';
import { GazetteerOracle } from './gazetteer.js';
import { NominatimOracle } from './nominatim.js';
import type { GeocodingOracle } from './types.js';

export type { GeocodingOracle, LookupOptions } from './types.js';
export { GazetteerOracle } from './gazetteer.js';
export { NominatimOracle } from './nominatim.js';
export { OracleHealthMonitor } from './health.js';

/**
 * Build the oracle named by the settings. The gazetteer provider needs the
 * gazetteer file contents; a gazetteer text always selects it. Names are
 * normalized with the same options as the mentions.
 */
export function createOracle(
  settings: OracleSettings,
  gazetteerText?: string,
  normalizer: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS
): GeocodingOracle {
  if (gazetteerText !== undefined) {
    return GazetteerOracle.fromJson(gazetteerText, settings.resultLimit, normalizer);
  }
  if (settings.provider === OracleProvider.GAZETTEER) {
    throw new ConfigurationError('the gazetteer provider needs a --gazetteer file');
  }
  return new NominatimOracle({ ...settings, normalizer });
}
