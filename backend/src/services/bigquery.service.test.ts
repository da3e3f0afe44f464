/**
 * Tests for flattening BigQuery values
 */

import { normalizeCell, normalizeRow } from './bigquery.service';

class Big {
  constructor(private readonly digits: string) {}

  toString(): string {
    return this.digits;
  }
}

describe('normalizeCell', () => {
  test.each([
    [null, null],
    [undefined, null],
    ['text', 'text'],
    [3.5, 3.5],
    [true, true],
    [BigInt(42), 42]
  ])('should keep %p as %p', (value, expected) => {
    expect(normalizeCell(value)).toBe(expected);
  });

  it('should unwrap dates and timestamps', () => {
    expect(normalizeCell(new Date('2024-03-01T10:00:00.000Z'))).toBe('2024-03-01T10:00:00.000Z');
    expect(normalizeCell({ value: '2024-03-01' })).toBe('2024-03-01');
  });

  it('should turn NUMERIC values into numbers', () => {
    expect(normalizeCell(new Big('12.50'))).toBe(12.5);
  });

  it('should encode bytes and serialise records', () => {
    expect(normalizeCell(Buffer.from('hi'))).toBe('aGk=');
    expect(normalizeCell({ city: 'Oslo' })).toBe('{"city":"Oslo"}');
  });
});

describe('normalizeRow', () => {
  it('should normalise every column', () => {
    expect(normalizeRow({ id: BigInt(7), hired: { value: '2020-01-01' }, note: undefined })).toEqual({
      id: 7,
      hired: '2020-01-01',
      note: null
    });
  });

  it('should return an empty row for non-objects', () => {
    expect(normalizeRow(5)).toEqual({});
  });
});
