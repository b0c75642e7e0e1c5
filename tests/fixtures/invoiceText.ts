export const METER_ID = 'AT0040000502000000000000010127094';

export const SAMPLE_INVOICE_TEXT = [
  'Musterwerke Energie GmbH',
  'Max Mustermann',
  'Hauptstraße 12',
  '1010 Wien',
  '',
  'Rechnungsnummer: 2024-001234',
  'Zählpunktnummer: AT 004000 05020 00000 00000 00101 27094',
  'Abrechnungszeitraum 01.01.2024 - 31.12.2024',
  'Verbrauch aktuell: 2.573,1 kWh',
  'Vorperiode: 3.000,0 kWh',
].join('\n');
