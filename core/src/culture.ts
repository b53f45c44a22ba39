/**
 * Culture configuration threaded explicitly through every decider call.
 *
 * Nothing reads process locale state: a guesser's settings carry the
 * culture, and the presets below are frozen.
 *
 * @module culture
 */

/** Order of day, month and year in a numeric date such as 01/02/2024 */
export type DateOrder = 'MDY' | 'DMY' | 'YMD';

export interface CultureConfig {
  readonly name: string;
  readonly decimalSeparator: string;
  /** Characters accepted between groups of three integer digits */
  readonly groupSeparators: readonly string[];
  readonly dateOrder: DateOrder;
  /** Full month names, January first; three-letter prefixes also match */
  readonly monthNames: readonly string[];
  readonly trueLiterals: readonly string[];
  readonly falseLiterals: readonly string[];
  /** Single-character literals, honoured only when charCanBeBoolean is set */
  readonly charTrueLiterals: readonly string[];
  readonly charFalseLiterals: readonly string[];
}

const ENGLISH_MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
] as const;

const GERMAN_MONTHS = [
  'januar', 'februar', 'märz', 'april', 'mai', 'juni',
  'juli', 'august', 'september', 'oktober', 'november', 'dezember',
] as const;

const FRENCH_MONTHS = [
  'janvier', 'février', 'mars', 'avril', 'mai', 'juin',
  'juillet', 'août', 'septembre', 'octobre', 'novembre', 'décembre',
] as const;

const ENGLISH_TRUE = ['true', 'yes', '.t.'] as const;
const ENGLISH_FALSE = ['false', 'no', '.f.'] as const;

function defineCulture(culture: CultureConfig): CultureConfig {
  return Object.freeze(culture);
}

/** Locale-neutral default: '.' decimals, ',' groups, month-first dates */
export const INVARIANT_CULTURE = defineCulture({
  name: 'invariant',
  decimalSeparator: '.',
  groupSeparators: [','],
  dateOrder: 'MDY',
  monthNames: ENGLISH_MONTHS,
  trueLiterals: ENGLISH_TRUE,
  falseLiterals: ENGLISH_FALSE,
  charTrueLiterals: ['t', 'y'],
  charFalseLiterals: ['f', 'n'],
});

export const EN_US_CULTURE = defineCulture({
  ...INVARIANT_CULTURE,
  name: 'en-US',
});

export const EN_GB_CULTURE = defineCulture({
  ...INVARIANT_CULTURE,
  name: 'en-GB',
  dateOrder: 'DMY',
});

export const DE_DE_CULTURE = defineCulture({
  name: 'de-DE',
  decimalSeparator: ',',
  groupSeparators: ['.'],
  dateOrder: 'DMY',
  monthNames: GERMAN_MONTHS,
  trueLiterals: [...ENGLISH_TRUE, 'ja', 'wahr'],
  falseLiterals: [...ENGLISH_FALSE, 'nein', 'falsch'],
  charTrueLiterals: ['t', 'y', 'j'],
  charFalseLiterals: ['f', 'n'],
});

export const FR_FR_CULTURE = defineCulture({
  name: 'fr-FR',
  decimalSeparator: ',',
  // space, no-break space, narrow no-break space
  groupSeparators: [' ', ' ', ' '],
  dateOrder: 'DMY',
  monthNames: FRENCH_MONTHS,
  trueLiterals: [...ENGLISH_TRUE, 'oui', 'vrai'],
  falseLiterals: [...ENGLISH_FALSE, 'non', 'faux'],
  charTrueLiterals: ['t', 'y', 'o'],
  charFalseLiterals: ['f', 'n'],
});

const CULTURES: ReadonlyMap<string, CultureConfig> = new Map(
  [INVARIANT_CULTURE, EN_US_CULTURE, EN_GB_CULTURE, DE_DE_CULTURE, FR_FR_CULTURE].map(
    c => [c.name.toLowerCase(), c] as const
  )
);

/**
 * Look up a preset culture by name (case-insensitive).
 */
export function getCulture(name: string): CultureConfig | undefined {
  return CULTURES.get(name.toLowerCase());
}

export function listCultureNames(): string[] {
  return [...CULTURES.values()].map(c => c.name);
}

/**
 * Index (0-11) of a month name or its three-letter prefix, or -1.
 */
export function monthIndex(culture: CultureConfig, token: string): number {
  const lower = token.toLowerCase().replace(/\.$/, '');
  if (lower.length < 3) return -1;
  for (let i = 0; i < culture.monthNames.length; i++) {
    const name = culture.monthNames[i];
    if (name === lower || (lower.length === 3 && name.startsWith(lower))) {
      return i;
    }
  }
  return -1;
}
