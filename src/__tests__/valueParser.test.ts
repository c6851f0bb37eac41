import {
  coerceNumber,
  distanceToKm,
  durationToSeconds,
  energyToKcal,
  lengthToMeters,
  parseExportTimestamp,
  parseMetadataValue,
  parseQuantity,
} from '../extractor/valueParser';

describe('coerceNumber', () => {
  it('parses decimal text', () => {
    expect(coerceNumber('12.5')).toBe(12.5);
    expect(coerceNumber(' 7 ')).toBe(7);
    expect(coerceNumber('1e3')).toBe(1000);
    expect(coerceNumber('-0.25')).toBe(-0.25);
  });

  it.each(['', 'abc', '0x10', 'Infinity', 'NaN', '12abc'])('rejects %p', (raw) => {
    expect(coerceNumber(raw)).toBeUndefined();
  });

  it('treats a missing value as absent', () => {
    expect(coerceNumber(undefined)).toBeUndefined();
  });
});

describe('parseExportTimestamp', () => {
  it('applies the written offset and keeps the written date', () => {
    const parsed = parseExportTimestamp('2024-01-15 23:30:00 -0800');
    expect(parsed?.date.toISOString()).toBe('2024-01-16T07:30:00.000Z');
    expect(parsed?.localDate).toBe('2024-01-15');
  });

  it('accepts ISO 8601 text', () => {
    expect(parseExportTimestamp('2024-01-15T08:30:00Z')?.date.toISOString()).toBe(
      '2024-01-15T08:30:00.000Z',
    );
    expect(parseExportTimestamp('2024-01-15T08:30:00+02:00')?.date.toISOString()).toBe(
      '2024-01-15T06:30:00.000Z',
    );
  });

  it('reads a timestamp without offset as UTC', () => {
    expect(parseExportTimestamp('2024-01-15 08:30:00')?.date.toISOString()).toBe(
      '2024-01-15T08:30:00.000Z',
    );
  });

  it.each(['2024-02-30 10:00:00 +0000', 'yesterday', '2024-01-15', ''])('rejects %p', (raw) => {
    expect(parseExportTimestamp(raw)).toBeUndefined();
  });
});

describe('unit conversion', () => {
  it('converts durations to seconds', () => {
    expect(durationToSeconds(30, 'min')).toBe(1800);
    expect(durationToSeconds(1.5, 'h')).toBe(5400);
    expect(durationToSeconds(45, 's')).toBe(45);
    expect(durationToSeconds(10, 'fortnight')).toBeUndefined();
  });

  it('converts distances to kilometres', () => {
    expect(distanceToKm(1, 'mi')).toBe(1.609_344);
    expect(distanceToKm(500, 'm')).toBeCloseTo(0.5, 10);
    expect(distanceToKm(3, undefined)).toBe(3);
    expect(distanceToKm(1, 'parsec')).toBeUndefined();
  });

  it('converts lengths to metres', () => {
    expect(lengthToMeters(2, 'km')).toBe(2000);
    expect(lengthToMeters(150, 'cm')).toBeCloseTo(1.5, 10);
    expect(lengthToMeters(12, undefined)).toBe(12);
  });

  it('converts energy to kilocalories', () => {
    expect(energyToKcal(4.184, 'kJ')).toBeCloseTo(1, 10);
    expect(energyToKcal(250, 'Cal')).toBe(250);
    expect(energyToKcal(250, 'kcal')).toBe(250);
    expect(energyToKcal(1, 'BTU')).toBeUndefined();
  });
});

describe('parseQuantity', () => {
  it('normalises centimetres, percentages and Fahrenheit', () => {
    const elevation = parseQuantity('10586 cm');
    expect(elevation?.unit).toBe('m');
    expect(elevation?.value).toBeCloseTo(105.86, 10);
    expect(parseQuantity('50 %')).toEqual({ unit: '%', value: 0.5 });
    expect(parseQuantity('212 degF')).toEqual({ unit: 'degC', value: 100 });
  });

  it('keeps other units as written', () => {
    expect(parseQuantity('9.5 kcal/hr·kg')).toEqual({ unit: 'kcal/hr·kg', value: 9.5 });
  });

  it('returns a bare number without unit', () => {
    expect(parseQuantity('42')).toEqual({ value: 42 });
  });

  it('rejects non-numeric text', () => {
    expect(parseQuantity('abc km')).toBeUndefined();
    expect(parseQuantity('   ')).toBeUndefined();
  });
});

describe('parseMetadataValue', () => {
  it('reads bare 0 and 1 as flags', () => {
    expect(parseMetadataValue('1')).toEqual({ value: true });
    expect(parseMetadataValue('0')).toEqual({ value: false });
  });

  it('reads other numbers and quantities', () => {
    expect(parseMetadataValue('2')).toEqual({ value: 2 });
    expect(parseMetadataValue('21.5 degC')).toEqual({ unit: 'degC', value: 21.5 });
  });

  it('keeps text and drops empty values', () => {
    expect(parseMetadataValue('Outdoor')).toEqual({ value: 'Outdoor' });
    expect(parseMetadataValue('')).toBeUndefined();
  });
});
