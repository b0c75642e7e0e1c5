import { describe, it, expect } from 'vitest';
import {
  collectUnitCandidates,
  locateConsumptionKwh,
  matchConsumption,
  pickCandidate,
} from '../../../../src/services/invoiceExtraction/consumptionLocator';
import { DEFAULT_EXTRACTION_OPTIONS } from '../../../../src/services/invoiceExtraction/constants';

const FILLER = 'Die Abrechnung erfolgt gemäß den Allgemeinen Lieferbedingungen.';

describe('locateConsumptionKwh', () => {
  it('prefers the "aktuell" reading over the previous period', () => {
    const text = 'aktuell: 2.573,1 kWh\nVorperiode: 3.000,0 kWh';
    expect(locateConsumptionKwh(text)).toBe('2573.1');
    expect(matchConsumption(text)?.tier).toBe('current-qualified');
  });

  it('keeps the largest qualified reading by default', () => {
    const text = 'Aktuell 1.200,0 kWh\nTeilbetrag\ncurrent: 2.573,1 kWh';
    expect(locateConsumptionKwh(text)).toBe('2573.1');
  });

  it('can keep the first qualified reading instead', () => {
    const text = 'Aktuell 1.200,0 kWh\nTeilbetrag\ncurrent: 2.573,1 kWh';
    expect(locateConsumptionKwh(text, { currentReadingPolicy: 'first' })).toBe('1200.0');
  });

  it('reads English separators', () => {
    expect(locateConsumptionKwh('current 2,573.1 kWh')).toBe('2573.1');
  });

  it('is case-insensitive', () => {
    expect(locateConsumptionKwh('AKTUELL 850 KWH')).toBe('850.0');
  });

  it('falls back to unit matches away from previous-period markers', () => {
    const text = `Gesamtverbrauch: 2.573,1 kWh\n${FILLER}\nVorperiode: 3.000,0 kWh`;
    expect(locateConsumptionKwh(text)).toBe('2573.1');
    expect(matchConsumption(text)?.tier).toBe('unit-fallback');
  });

  it('takes the largest surviving fallback value', () => {
    expect(locateConsumptionKwh('Strom 1.850 kWh\nVerbrauch 3412 kWh')).toBe('3412.0');
  });

  it('drops readings next to "previous"', () => {
    expect(locateConsumptionKwh('Previous period: 4.100 kWh')).toBeUndefined();
  });

  it('drops values outside the plausible range', () => {
    expect(locateConsumptionKwh('Kundennummer 123456 kWh\nGrundpreis 1 kWh')).toBeUndefined();
  });

  it('honours a wider range', () => {
    const options = { kwhRange: { min: 1, max: 1000000 } };
    expect(locateConsumptionKwh('Verbrauch 150000 kWh', options)).toBe('150000.0');
  });

  it('falls through to the unit pass when the qualified value is out of range', () => {
    expect(locateConsumptionKwh('aktuell 0,5 kWh\nVerbrauch 812 kWh')).toBe('812.0');
  });

  it('discards malformed number tokens', () => {
    expect(locateConsumptionKwh('Verbrauch 1.234.56 kWh')).toBeUndefined();
    expect(locateConsumptionKwh('aktuell 1,234,56 kWh')).toBeUndefined();
  });

  it('returns undefined without any kWh figure', () => {
    expect(locateConsumptionKwh('Rechnungsbetrag 120,50 EUR')).toBeUndefined();
    expect(locateConsumptionKwh('')).toBeUndefined();
  });
});

describe('collectUnitCandidates', () => {
  it('records label and the number-through-unit span', () => {
    const text = 'Gesamtverbrauch: 2.573,1 kWh';
    const [candidate] = collectUnitCandidates(text, DEFAULT_EXTRACTION_OPTIONS);
    expect(candidate).toEqual({
      raw: '2.573,1',
      value: 2573.1,
      span: { start: 17, end: 28 },
      label: 'gesamtverbrauch',
    });
  });

  it('uses the configured window size', () => {
    const text = `Verbrauch 2573 kWh\n${FILLER}\nVorperiode`;
    const wide = { ...DEFAULT_EXTRACTION_OPTIONS, previousPeriodWindowChars: 200 };
    expect(collectUnitCandidates(text, DEFAULT_EXTRACTION_OPTIONS)).toHaveLength(1);
    expect(collectUnitCandidates(text, wide)).toHaveLength(0);
  });
});

describe('pickCandidate', () => {
  const a = { raw: '10', value: 10, span: { start: 0, end: 2 } };
  const b = { raw: '20', value: 20, span: { start: 5, end: 7 } };
  const c = { raw: '20,0', value: 20, span: { start: 9, end: 13 } };

  it('max keeps the earliest of equal maxima', () => {
    expect(pickCandidate([a, b, c], 'max')).toBe(b);
  });

  it('first keeps document order', () => {
    expect(pickCandidate([a, b, c], 'first')).toBe(a);
  });

  it('returns undefined for no candidates', () => {
    expect(pickCandidate([], 'max')).toBeUndefined();
  });
});
