import { formatCurrency, formatRate } from '../../utils/format';

describe('formatCurrency', () => {
  it('should format pounds with grouping and two decimals', () => {
    expect(formatCurrency(1234.5)).toBe('£1,234.50');
  });

  it('should round to pence', () => {
    expect(formatCurrency(40516.9336)).toBe('£40,516.93');
  });

  it('should format negative amounts', () => {
    expect(formatCurrency(-72000)).toBe('-£72,000.00');
  });

  it('should print negative zero as zero', () => {
    expect(formatCurrency(-0)).toBe('£0.00');
  });
});

describe('formatRate', () => {
  it('should format a decimal rate as a percentage', () => {
    expect(formatRate(0.045)).toBe('4.5%');
    expect(formatRate(0.07)).toBe('7.0%');
    expect(formatRate(0)).toBe('0.0%');
  });
});
