export * from './codec.js';
export * from './json.js';
export * from './parameters.js';
export * from './sampling.js';
export { formatRoundTripNumber, parseRoundTripNumber } from './round-trip-format.js';
export { localeGlyphs, type LocaleGlyphs } from './general-format.js';
