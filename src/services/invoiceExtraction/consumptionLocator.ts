import { formatKwh, parseKwhValue } from '../../utils/numberParsing';
import { firstMatch, type Tier } from './tiers';
import { isNearKeyword, type MatchSpan } from './keywordProximity';
import { CONSUMPTION_LABEL_SOURCE, CURRENT_QUALIFIER_SOURCE, resolveExtractionOptions } from './constants';
import type { ConsumptionTier, CurrentReadingPolicy, ExtractionOptions } from './types';

// Digits with any mix of "." / "," groups; the decision table in numberParsing sorts out the roles.
const NUMBER_SOURCE = '\\d+(?:[.,]\\d+)*';

const CURRENT_QUALIFIED_RE = new RegExp(`\\b${CURRENT_QUALIFIER_SOURCE}[:\\s]*(${NUMBER_SOURCE})\\s*kwh`, 'gi');
const UNIT_RE = new RegExp(`(?:(${CONSUMPTION_LABEL_SOURCE})[:\\s]*)?(?<![\\d.,])(${NUMBER_SOURCE})\\s*kwh`, 'gi');

export type ConsumptionCandidate = {
  raw: string;
  value: number;
  /** Number through unit, e.g. "2.573,1 kWh" */
  span: MatchSpan;
  label?: string;
};

type ConsumptionOptions = Pick<
  ExtractionOptions,
  'kwhRange' | 'previousPeriodWindowChars' | 'previousPeriodKeywords' | 'currentReadingPolicy'
>;

function toCandidate(m: RegExpMatchArray, raw: string, opts: ConsumptionOptions, label?: string) {
  const value = parseKwhValue(raw, opts.kwhRange);
  if (value === null) return undefined;
  const matchStart = m.index ?? 0;
  const start = matchStart + m[0].lastIndexOf(raw);
  const candidate: ConsumptionCandidate = {
    raw,
    value,
    span: { start, end: matchStart + m[0].length },
  };
  if (label) candidate.label = label.toLowerCase();
  return candidate;
}

/**
 * Largest value wins, ties keep the earliest occurrence.
 */
export function pickCandidate(
  candidates: ConsumptionCandidate[],
  policy: CurrentReadingPolicy
): ConsumptionCandidate | undefined {
  if (candidates.length === 0) return undefined;
  if (policy === 'first') return candidates[0];
  return candidates.reduce((best, c) => (c.value > best.value ? c : best));
}

export function collectCurrentQualified(text: string, opts: ConsumptionOptions): ConsumptionCandidate[] {
  const out: ConsumptionCandidate[] = [];
  for (const m of text.matchAll(CURRENT_QUALIFIED_RE)) {
    const c = toCandidate(m, m[1], opts);
    if (c) out.push(c);
  }
  return out;
}

export function collectUnitCandidates(text: string, opts: ConsumptionOptions): ConsumptionCandidate[] {
  const filter = { windowChars: opts.previousPeriodWindowChars, keywords: opts.previousPeriodKeywords };
  const out: ConsumptionCandidate[] = [];
  for (const m of text.matchAll(UNIT_RE)) {
    const c = toCandidate(m, m[2], opts, m[1]);
    if (!c) continue;
    if (isNearKeyword(text, c.span, filter)) continue;
    out.push(c);
  }
  return out;
}

export function consumptionTiers(opts: ConsumptionOptions): ReadonlyArray<Tier<ConsumptionTier, ConsumptionCandidate>> {
  return [
    {
      name: 'current-qualified',
      locate: (text) => pickCandidate(collectCurrentQualified(text, opts), opts.currentReadingPolicy),
    },
    {
      name: 'unit-fallback',
      locate: (text) => pickCandidate(collectUnitCandidates(text, opts), 'max'),
    },
  ];
}

export function matchConsumption(text: string, options?: Partial<ExtractionOptions>) {
  const opts = resolveExtractionOptions(options);
  return firstMatch(consumptionTiers(opts), text);
}

export function locateConsumptionKwh(text: string, options?: Partial<ExtractionOptions>): string | undefined {
  const match = matchConsumption(text, options);
  return match ? formatKwh(match.value.value) : undefined;
}
