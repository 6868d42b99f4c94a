/**
 * Tests for Description Similarity
 */

import {
  calculateDescriptionSimilarity,
  tokenize,
} from '../../src/matching/descriptionSimilarity';

describe('tokenize', () => {
  it('should lowercase and split on punctuation', () => {
    expect([...tokenize('ACH Payment - Acme Corp.')]).toEqual(['ach', 'payment', 'acme', 'corp']);
  });

  it('should de-duplicate tokens', () => {
    expect([...tokenize('rent RENT Rent')]).toEqual(['rent']);
  });

  it('should keep accented letters inside a word', () => {
    expect([...tokenize('Müller GmbH')]).toEqual(['müller', 'gmbh']);
  });

  it('should tokenize scripts without Latin letters', () => {
    expect([...tokenize('東京電力 支払')]).toEqual(['東京電力', '支払']);
    expect([...tokenize('Ενοίκιο Αθήνα')]).toEqual(['ενοίκιο', 'αθήνα']);
  });

  it('should return an empty set for empty input', () => {
    expect(tokenize('').size).toBe(0);
  });
});

describe('calculateDescriptionSimilarity', () => {
  it('should return 1 for identical descriptions', () => {
    expect(calculateDescriptionSimilarity('Office rent', 'Office rent')).toBe(1);
  });

  it('should be case-insensitive', () => {
    expect(calculateDescriptionSimilarity('OFFICE RENT', 'office rent')).toBe(1);
  });

  it('should return the Jaccard ratio for partial overlap', () => {
    // {acme, corp, invoice, 42} vs {acme, corp}: 2 shared of 4
    expect(calculateDescriptionSimilarity('Acme Corp invoice 42', 'ACME CORP')).toBe(0.5);
  });

  it('should score identical non-Latin descriptions as 1', () => {
    expect(calculateDescriptionSimilarity('東京電力 支払', '東京電力 支払')).toBe(1);
    expect(calculateDescriptionSimilarity('Zahlung Müller', 'MÜLLER Zahlung')).toBe(1);
  });

  it('should compare Greek descriptions word by word', () => {
    // {ενοίκιο, αθήνα} vs {ενοίκιο, αθήνα, μάρτιος}: 2 shared of 3
    expect(calculateDescriptionSimilarity('Ενοίκιο Αθήνα', 'ενοίκιο αθήνα μάρτιος')).toBeCloseTo(2 / 3, 10);
  });

  it('should return 0 when no word is shared', () => {
    expect(calculateDescriptionSimilarity('Rent', 'Payroll')).toBe(0);
  });

  it('should return 0 when either side is empty', () => {
    expect(calculateDescriptionSimilarity('', 'Payroll')).toBe(0);
    expect(calculateDescriptionSimilarity('Payroll', '')).toBe(0);
    expect(calculateDescriptionSimilarity('', '')).toBe(0);
  });

  it('should be symmetric', () => {
    const a = 'Wire transfer Globex 7781';
    const b = 'Globex wire';
    expect(calculateDescriptionSimilarity(a, b)).toBe(calculateDescriptionSimilarity(b, a));
  });
});
