import { firstMatch, type Tier } from './tiers';
import { METER_ID_LABEL_SOURCE, METER_POINT_COUNTRY_PREFIX, METER_POINT_ID_LENGTH_DEFAULT } from './constants';
import type { MeterIdTier } from './types';

const LETTER_RE = /[A-Za-z]/;
const DIGIT_RE = /\d/;
const LOWERCASE_RE = /[a-zäöüß]/;

/**
 * Pure numbers of the right length are usually phone, customer or IBAN-like numbers.
 * A meter-point id always mixes the country letters with digits.
 */
export function isPlausibleMeterPointId(candidate: string, length = METER_POINT_ID_LENGTH_DEFAULT): boolean {
  return candidate.length === length && LETTER_RE.test(candidate) && DIGIT_RE.test(candidate);
}

/**
 * Concatenates the whitespace-separated groups that follow a country prefix ending at `from`,
 * stopping once the target length is reached. Only an exact hit counts, so text trailing
 * the id (next label, next line) does not spoil the match. Ids are upper case, so a group
 * with a lowercase letter ends the id even when matching case-insensitively.
 */
function assembleGroups(text: string, from: number, prefix: string, length: number, ignoreCase: boolean) {
  const groupRe = new RegExp('\\s+([A-Z0-9]+)\\b', ignoreCase ? 'iy' : 'y');
  groupRe.lastIndex = from;

  let id = prefix;
  while (id.length < length) {
    const m = groupRe.exec(text);
    if (!m || LOWERCASE_RE.test(m[1])) break;
    id += m[1];
  }
  return id.length === length ? id : undefined;
}

function firstGrouped(text: string, startRe: RegExp, length: number, ignoreCase: boolean): string | undefined {
  for (const m of text.matchAll(startRe)) {
    const prefix = m[1];
    const from = (m.index ?? 0) + m[0].length;
    const id = assembleGroups(text, from, prefix, length, ignoreCase);
    if (id && isPlausibleMeterPointId(id, length)) return id;
  }
  return undefined;
}

function firstContiguous(text: string, re: RegExp, length: number): string | undefined {
  for (const m of text.matchAll(re)) {
    const id = m[1];
    if (isPlausibleMeterPointId(id, length)) return id;
  }
  return undefined;
}

export function locateLabeledGrouped(text: string, length = METER_POINT_ID_LENGTH_DEFAULT) {
  const re = new RegExp(`${METER_ID_LABEL_SOURCE}[:\\s]*(${METER_POINT_COUNTRY_PREFIX})(?=\\s+[A-Z0-9])`, 'gi');
  return firstGrouped(text, re, length, true);
}

export function locateLabeledContiguous(text: string, length = METER_POINT_ID_LENGTH_DEFAULT) {
  const re = new RegExp(`${METER_ID_LABEL_SOURCE}[:\\s]*([A-Z0-9]{${length}})(?![A-Z0-9])`, 'gi');
  return firstContiguous(text, re, length);
}

export function locatePrefixedGrouped(text: string, length = METER_POINT_ID_LENGTH_DEFAULT) {
  const re = new RegExp(`\\b(${METER_POINT_COUNTRY_PREFIX})(?=\\s+[A-Z0-9])`, 'g');
  return firstGrouped(text, re, length, false);
}

export function locatePrefixedContiguous(text: string, length = METER_POINT_ID_LENGTH_DEFAULT) {
  const rest = length - METER_POINT_COUNTRY_PREFIX.length;
  const re = new RegExp(`\\b(${METER_POINT_COUNTRY_PREFIX}[A-Z0-9]{${rest}})\\b`, 'g');
  return firstContiguous(text, re, length);
}

export function locateGeneric(text: string, length = METER_POINT_ID_LENGTH_DEFAULT) {
  const re = new RegExp(`\\b([A-Z0-9]{${length}})\\b`, 'g');
  return firstContiguous(text, re, length);
}

export function meterIdTiers(length = METER_POINT_ID_LENGTH_DEFAULT): ReadonlyArray<Tier<MeterIdTier, string>> {
  return [
    { name: 'labeled-grouped', locate: (text) => locateLabeledGrouped(text, length) },
    { name: 'labeled-contiguous', locate: (text) => locateLabeledContiguous(text, length) },
    { name: 'prefixed-grouped', locate: (text) => locatePrefixedGrouped(text, length) },
    { name: 'prefixed-contiguous', locate: (text) => locatePrefixedContiguous(text, length) },
    { name: 'generic', locate: (text) => locateGeneric(text, length) },
  ];
}

export function matchMeterId(text: string, length = METER_POINT_ID_LENGTH_DEFAULT) {
  return firstMatch(meterIdTiers(length), text);
}

export function locateMeterId(text: string, length = METER_POINT_ID_LENGTH_DEFAULT): string | undefined {
  return matchMeterId(text, length)?.value;
}
