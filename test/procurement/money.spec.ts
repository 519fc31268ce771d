import { expect } from 'chai';

import {
  formatMoney,
  fromMinorUnits,
  isWholeMinorAmount,
  toMinorUnits,
} from '../../src/procurement/index.js';

describe('money helpers', () => {
  it('converts to exact minor units', () => {
    expect(toMinorUnits(0.1 + 0.2)).to.equal(30);
    expect(toMinorUnits(19.99)).to.equal(1999);
    expect(fromMinorUnits(1234)).to.equal(12.34);
  });

  it('accepts at most two decimals', () => {
    expect(isWholeMinorAmount(19.99)).to.equal(true);
    expect(isWholeMinorAmount(10.005)).to.equal(false);
    expect(isWholeMinorAmount(Number.NaN)).to.equal(false);
  });

  it('formats in the configured currency', () => {
    expect(formatMoney(1234.5, 'USD')).to.equal('$1,234.50');
  });

  it('falls back to a plain format for an unknown currency code', () => {
    expect(formatMoney(5, 'XX1')).to.equal('XX1 5.00');
  });
});
