import { expect } from 'chai';

import { KeyedSequencer } from '../../src/procurement/index.js';
import { rejectionOf } from '../support/fixtures.js';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('KeyedSequencer', () => {
  it('runs work for one key in submission order', async () => {
    const sequencer = new KeyedSequencer();
    const order: string[] = [];

    const first = sequencer.run('IT', async () => {
      await delay(20);
      order.push('first');
    });
    const second = sequencer.run('IT', async () => {
      order.push('second');
    });
    await Promise.all([first, second]);

    expect(order).to.deep.equal(['first', 'second']);
  });

  it('lets different keys overlap', async () => {
    const sequencer = new KeyedSequencer();
    const order: string[] = [];

    const slow = sequencer.run('IT', async () => {
      await delay(20);
      order.push('IT');
    });
    const fast = sequencer.run('OPS', async () => {
      order.push('OPS');
    });
    await Promise.all([slow, fast]);

    expect(order).to.deep.equal(['OPS', 'IT']);
  });

  it('keeps the queue moving after a failure', async () => {
    const sequencer = new KeyedSequencer();

    const failing = sequencer.run('IT', async () => {
      throw new Error('boom');
    });
    const next = sequencer.run('IT', async () => 'ok');

    const err = await rejectionOf(failing);
    expect(err).to.be.instanceOf(Error);
    expect(await next).to.equal('ok');
  });

  it('forgets keys once their work settles', async () => {
    const sequencer = new KeyedSequencer();
    await sequencer.run('IT', async () => 1);
    await delay(0);

    expect(sequencer.activeKeys).to.equal(0);
  });
});
