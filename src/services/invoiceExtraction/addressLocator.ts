import { firstMatch, type Tier } from './tiers';
import { STREET_SUFFIX_WORDS } from './constants';
import type { AddressTier } from './types';

// Austrian postal codes are exactly 4 digits; the city may be hyphenated or multi-word ("Sankt Pölten").
const POSTAL_LINE_RE = /^(\d{4})\s+([A-ZÄÖÜ][a-zäöüß]+(?:[\s-][A-ZÄÖÜ][a-zäöüß]+)*)$/;

// "Hauptstraße 12", "Karl-Roll-Str. 16", "Am Kirchenplatz 3a"
// Street and name start at a word start; under "i" the capital-letter classes match any letter.
const STREET_SOURCE = '(?<![A-Za-zÄÖÜäöüß-])([A-ZÄÖÜ][a-zäöüß-]+(?:\\.|straße|strasse|platz|weg|gasse|allee|ring|str\\.?))\\s+(\\d+[a-z]?)';
const STREET_RE = new RegExp(STREET_SOURCE, 'i');

const NAME_LINE_RE = /^[A-ZÄÖÜ][a-zäöüß]+\s+[A-ZÄÖÜ][a-zäöüß]+$/;

const SINGLE_LINE_RE = new RegExp(
  '(?:(?<![A-Za-zÄÖÜäöüß])([A-ZÄÖÜ][a-zäöüß]+\\s+[A-ZÄÖÜ][a-zäöüß]+)(?:,\\s*|\\s+))?' +
    STREET_SOURCE +
    ',?\\s*(\\d{4})\\s+([A-ZÄÖÜ][a-zäöüß]+(?:[\\s-][A-ZÄÖÜ][a-zäöüß]+)*)',
  'i'
);

const MIN_ADDRESS_PARTS = 2;

export function toLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}

export function isPostalLine(line: string): boolean {
  return POSTAL_LINE_RE.test(line);
}

export function isStreetLine(line: string): boolean {
  return STREET_RE.test(line);
}

// "ring" and "weg" also end surnames (Döring, Herweg), so they only count as whole words.
const COMPOUND_STREET_SUFFIXES = ['straße', 'strasse', 'gasse', 'platz', 'allee'];

function isStreetWord(word: string): boolean {
  return (
    STREET_SUFFIX_WORDS.some((suffix) => word === suffix) ||
    COMPOUND_STREET_SUFFIXES.some((suffix) => word.endsWith(suffix))
  );
}

export function isNameLine(line: string): boolean {
  if (!NAME_LINE_RE.test(line)) return false;
  return !line.toLowerCase().split(/\s+/).some(isStreetWord);
}

function joinParts(parts: string[]): string | undefined {
  return parts.length >= MIN_ADDRESS_PARTS ? parts.join(', ') : undefined;
}

/**
 * Postal line at i, street at i-1, optional name at i-2.
 * The name is only looked for once a street was found.
 */
export function locateByPostalAnchor(lines: string[]): string | undefined {
  for (let i = 0; i < lines.length; i++) {
    if (!isPostalLine(lines[i])) continue;

    const parts: string[] = [];
    if (i > 0 && isStreetLine(lines[i - 1])) {
      parts.push(lines[i - 1]);
      if (i > 1 && isNameLine(lines[i - 2])) {
        parts.unshift(lines[i - 2]);
      }
    }
    parts.push(lines[i]);

    const address = joinParts(parts);
    if (address) return address;
  }
  return undefined;
}

export function locateByStreetThenPostal(lines: string[]): string | undefined {
  for (let i = 0; i < lines.length - 1; i++) {
    if (!isStreetLine(lines[i]) || !isPostalLine(lines[i + 1])) continue;

    const parts: string[] = [];
    if (i > 0 && isNameLine(lines[i - 1])) {
      parts.push(lines[i - 1]);
    }
    parts.push(lines[i], lines[i + 1]);

    const address = joinParts(parts);
    if (address) return address;
  }
  return undefined;
}

export function locateSingleLine(lines: string[]): string | undefined {
  for (const line of lines) {
    const m = SINGLE_LINE_RE.exec(line);
    if (!m) continue;
    const [, name, street, houseNumber, postalCode, city] = m;
    const parts: string[] = [];
    if (name) parts.push(name);
    parts.push(`${street} ${houseNumber}`, `${postalCode} ${city}`);
    return parts.join(', ');
  }
  return undefined;
}

export const ADDRESS_TIERS: ReadonlyArray<Tier<AddressTier, string, string[]>> = [
  { name: 'postal-anchored', locate: locateByPostalAnchor },
  { name: 'street-then-postal', locate: locateByStreetThenPostal },
  { name: 'single-line', locate: locateSingleLine },
];

export function matchAddress(text: string) {
  return firstMatch(ADDRESS_TIERS, toLines(text));
}

export function locateAddress(text: string): string | undefined {
  return matchAddress(text)?.value;
}
