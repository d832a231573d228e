import {
  addAmounts,
  clampToZero,
  compareAmounts,
  fromSubunits,
  isDecimalAmount,
  normalizeAmount,
  percentageOf,
  splitAmount,
  subtractAmounts,
  toMinorUnits,
  toSubunits,
} from './money';

describe('money', () => {
  it('parses decimal strings and numbers into minor units', () => {
    expect(toMinorUnits('4000.00')).toBe(400000n);
    expect(toMinorUnits('0.1')).toBe(10n);
    expect(toMinorUnits(1500)).toBe(150000n);
    expect(toMinorUnits('-2.50')).toBe(-250n);
    expect(toMinorUnits('12.5000')).toBe(1250n);
  });

  it('rejects malformed or over-precise amounts', () => {
    expect(() => toMinorUnits('12.345')).toThrow('Invalid decimal amount: 12.345');
    expect(() => toMinorUnits('abc')).toThrow();
    expect(() => toMinorUnits(Number.NaN)).toThrow();
    expect(isDecimalAmount('1e3')).toBe(false);
    expect(isDecimalAmount('10.25')).toBe(true);
    expect(isDecimalAmount(null)).toBe(false);
  });

  it('adds without float drift', () => {
    expect(addAmounts('0.10', '0.20')).toBe('0.30');
    expect(addAmounts('4000.00', '1500.50', '0.05')).toBe('5500.55');
    expect(subtractAmounts('10000.00', '4000.00')).toBe('6000.00');
    expect(subtractAmounts('100.00', '100.01')).toBe('-0.01');
  });

  it('compares and clamps', () => {
    expect(compareAmounts('1.00', '1')).toBe(0);
    expect(compareAmounts('0.99', '1.00')).toBe(-1);
    expect(clampToZero('-25.00')).toBe('0.00');
    expect(clampToZero('25')).toBe('25.00');
    expect(normalizeAmount(7)).toBe('7.00');
  });

  it('computes percentages rounded to two decimals', () => {
    expect(percentageOf('4000.00', '10000.00')).toBe(40);
    expect(percentageOf('1.00', '3.00')).toBe(33.33);
    expect(percentageOf('2.00', '3.00')).toBe(66.67);
    expect(percentageOf('5.00', '0.00')).toBe(0);
  });

  it('converts to and from gateway subunits', () => {
    expect(toSubunits('4000.00')).toBe(400000);
    expect(fromSubunits(150050)).toBe('1500.50');
    expect(fromSubunits('99')).toBe('0.99');
  });

  it('splits totals into installments with the remainder on the last one', () => {
    expect(splitAmount('10000.00', 3)).toEqual(['3333.33', '3333.33', '3333.34']);
    expect(splitAmount('500.00', 1)).toEqual(['500.00']);
  });
});
