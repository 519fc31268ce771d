import { expect } from 'chai';

import { createLogger, parseProcurementEnv, setDebugLogging } from '../../src/procurement/index.js';

describe('createLogger', () => {
  const originalDebug = console.debug;
  let lines: unknown[][];

  beforeEach(() => {
    lines = [];
    console.debug = (...args: unknown[]) => {
      lines.push(args);
    };
  });

  afterEach(() => {
    console.debug = originalDebug;
    setDebugLogging(false);
  });

  it('drops debug lines by default', () => {
    createLogger('Ledger').debug('hidden');
    expect(lines).to.deep.equal([]);
  });

  it('prints tagged debug lines once PROCUREMENT_DEBUG is enabled', () => {
    setDebugLogging(parseProcurementEnv({ PROCUREMENT_DEBUG: '1' }).PROCUREMENT_DEBUG);

    createLogger('Ledger').debug('reserved', 42);
    expect(lines).to.deep.equal([['[Ledger][debug]', 'reserved', 42]]);
  });

  it('turns debug lines back off', () => {
    setDebugLogging(true);
    setDebugLogging(parseProcurementEnv({ PROCUREMENT_DEBUG: 'false' }).PROCUREMENT_DEBUG);

    createLogger('Ledger').debug('hidden');
    expect(lines).to.deep.equal([]);
  });
});
