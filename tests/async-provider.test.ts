import { describe, expect, it } from 'vitest';
import { defineModule, inject, provided } from '../src/index.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

interface Session {
  readonly id: string;
}

interface Services {
  config: { dsn: string };
  clock: { now: number };
  first: Session;
  second: Session;
  pair: { first: Session; second: Session; now: number };
}

describe('async providers', () => {
  it('awaits provider dependencies one at a time, in declaration order', async () => {
    const events: string[] = [];
    const module = defineModule<Services>()
      .component('config', { build: () => ({ dsn: 'mem://test' }) })
      .provider('clock', { build: () => ({ now: 1000 }) })
      .asyncProvider('first', {
        build: async () => {
          events.push('first:start');
          await tick();
          events.push('first:end');
          return { id: 'first' };
        },
      })
      .asyncProvider('second', {
        build: async () => {
          events.push('second:start');
          await tick();
          events.push('second:end');
          return { id: 'second' };
        },
      })
      .asyncProvider('pair', {
        properties: {
          first: provided('first'),
          second: provided('second'),
          clock: provided('clock'),
        },
        build: async ({ first, second, clock }) => {
          events.push('pair');
          return { first, second, now: clock.now };
        },
      })
      .compose()
      .build();

    const pair = await module.asyncProvide('pair');

    expect(events).toEqual([
      'first:start',
      'first:end',
      'second:start',
      'second:end',
      'pair',
    ]);
    expect(pair.first.id).toBe('first');
    expect(pair.second.id).toBe('second');
    expect(pair.now).toBe(1000);
  });

  it('returns a fresh instance on every asyncProvide', async () => {
    let count = 0;
    const module = defineModule<Services>()
      .asyncProvider('first', {
        build: async () => ({ id: `session-${++count}` }),
      })
      .compose()
      .build();

    const a = await module.asyncProvide('first');
    const b = await module.asyncProvide('first');

    expect(a).not.toBe(b);
    expect(a.id).toBe('session-1');
    expect(b.id).toBe('session-2');
  });

  it('injects shared components into async providers', async () => {
    const module = defineModule<Services>()
      .component('config', { build: () => ({ dsn: 'mem://test' }) })
      .asyncProvider('first', {
        properties: { config: inject('config') },
        build: async ({ config }) => ({ id: config.dsn }),
      })
      .compose()
      .build();

    expect((await module.asyncProvide('first')).id).toBe('mem://test');
    expect(module.health().resolved).toEqual(['config']);
  });

  it('rejects with the provider error unchanged', async () => {
    const failure = new Error('handshake failed');
    const module = defineModule<Services>()
      .asyncProvider('first', {
        build: async () => {
          await tick();
          throw failure;
        },
      })
      .compose()
      .build();

    await expect(module.asyncProvide('first')).rejects.toBe(failure);
  });

  it('stops at the first failing dependency', async () => {
    const failure = new Error('first failed');
    const events: string[] = [];
    const module = defineModule<Services>()
      .asyncProvider('first', {
        build: async () => {
          events.push('first');
          throw failure;
        },
      })
      .asyncProvider('second', {
        build: async () => {
          events.push('second');
          return { id: 'second' };
        },
      })
      .asyncProvider('pair', {
        properties: { first: provided('first'), second: provided('second') },
        build: async ({ first, second }) => {
          events.push('pair');
          return { first, second, now: 0 };
        },
      })
      .compose()
      .build();

    await expect(module.asyncProvide('pair')).rejects.toBe(failure);
    expect(events).toEqual(['first']);
  });

  it('replaces an async provider with an override that receives the module', async () => {
    const module = defineModule<Services>()
      .component('config', { build: () => ({ dsn: 'mem://test' }) })
      .asyncProvider('first', { build: async () => ({ id: 'real' }) })
      .asyncProvider('pair', {
        properties: { first: provided('first'), second: provided('first') },
        build: async ({ first, second }) => ({ first, second, now: 0 }),
      })
      .compose()
      .builder()
      .withAsyncProviderOverride('first', async (m) => ({
        id: `fake:${m.resolve('config').dsn}`,
      }))
      .build();

    const pair = await module.asyncProvide('pair');

    expect(pair.first.id).toBe('fake:mem://test');
    expect(pair.second.id).toBe('fake:mem://test');
    expect(pair.first).not.toBe(pair.second);
  });
});
