import { describe, expect, it } from 'vitest';
import { DtcSeverityClassifier } from '../src/services/obd/DtcSeverityClassifier';

describe('DtcSeverityClassifier', () => {
  const classifier = new DtcSeverityClassifier();

  it('classifies by code pattern', () => {
    expect(classifier.classifySeverity('P0300')).toBe('critical');
    expect(classifier.classifySeverity('u0101')).toBe('critical');
    expect(classifier.classifySeverity('P0171')).toBe('warning');
    expect(classifier.classifySeverity('P0420')).toBe('warning');
    expect(classifier.classifySeverity('C1234')).toBe('warning');
    expect(classifier.classifySeverity('P0600')).toBe('info');
  });

  it('normalizes, dedupes and tags categories', () => {
    expect(classifier.classify([' p0420 ', 'P0420', '', 'B0001'])).toEqual([
      { code: 'P0420', severity: 'warning', category: 'powertrain' },
      { code: 'B0001', severity: 'critical', category: 'body' },
    ]);
  });
});
