import { ConfigError } from '../platform/errors';
import { decodeCondition, encodeCondition, ratingLetter, ratingValue } from './gate-conditions';

describe('gate conditions', () => {
  it('should encode conditions with symbolic operators', () => {
    expect(encodeCondition({ metric: 'new_coverage', op: 'LT', error: '80' })).toBe('new_coverage <= 80');
    expect(encodeCondition({ metric: 'new_violations', op: 'GT', error: '0' })).toBe('new_violations >= 0');
  });

  it('should write ratings as letters', () => {
    expect(encodeCondition({ metric: 'new_security_rating', op: 'GT', error: '1' })).toBe('new_security_rating >= A');
    expect(ratingLetter('3')).toBe('C');
    expect(ratingLetter('9')).toBe('9');
  });

  it('should decode the text form back', () => {
    expect(decodeCondition('new_coverage <= 80')).toEqual({ metric: 'new_coverage', op: 'LT', error: '80' });
    expect(decodeCondition('  new_reliability_rating  >=  b ')).toEqual({
      metric: 'new_reliability_rating',
      op: 'GT',
      error: '2',
    });
    expect(decodeCondition('new_duplicated_lines_density GT 3')).toEqual({
      metric: 'new_duplicated_lines_density',
      op: 'GT',
      error: '3',
    });
    expect(ratingValue('Z')).toBe('Z');
  });

  it('should reject malformed conditions', () => {
    expect(() => decodeCondition('new_coverage 80')).toThrow(ConfigError);
    expect(() => decodeCondition('new_coverage == 80')).toThrow(
      "Invalid operator '==' in quality gate condition 'new_coverage == 80'"
    );
  });
});
