import { describe, expect, it } from 'vitest';
import {
  CircularDependencyError,
  ComponentDependsOnProviderError,
  CompositionError,
  DependencyKindError,
  DuplicateBindingError,
  defineModule,
  InvalidBindingError,
  inject,
  MissingBindingError,
  MissingParameterError,
  param,
  provided,
} from '../src/index.js';
import type { InjectProperty } from '../src/index.js';

interface Services {
  output: string;
  writer: string;
  connection: string;
  repository: string;
  service: string;
  session: string;
}

describe('compose', () => {
  it('rejects a key bound twice', () => {
    const builder = defineModule<Services>().component('output', {
      build: () => 'console',
    });

    try {
      builder.provider('output', { build: () => 'file' });
      expect.fail('should throw');
    } catch (e) {
      expect(e).toBeInstanceOf(DuplicateBindingError);
      expect(e).toBeInstanceOf(CompositionError);
      const err = e as DuplicateBindingError;
      expect(err.message).toBe("'output' is already bound as a component.");
      expect(err.details).toEqual({
        key: 'output',
        existing: 'component',
        attempted: 'provider',
      });
    }
  });

  it('rejects a dependency on an unbound key and suggests a close match', () => {
    const builder = defineModule<Services & { ouput: string }>()
      .component('output', { build: () => 'console' })
      .component('writer', {
        properties: { target: inject('ouput') },
        build: ({ target }) => `writer(${target})`,
      });

    try {
      builder.compose();
      expect.fail('should throw');
    } catch (e) {
      expect(e).toBeInstanceOf(MissingBindingError);
      const err = e as MissingBindingError;
      expect(err.details).toEqual({
        from: 'writer',
        property: 'target',
        key: 'ouput',
        registered: ['output', 'writer'],
        suggestion: 'output',
      });
      expect(err.message).toBe(
        "'writer' depends on 'ouput' (property 'target'), which is not bound.\nRegistered keys: [output, writer]\n\nDid you mean 'output'?",
      );
    }
  });

  it('omits the suggestion when nothing is close', () => {
    const builder = defineModule<Services>()
      .component('writer', {
        properties: { target: inject('session') },
        build: ({ target }) => target,
      });

    try {
      builder.compose();
      expect.fail('should throw');
    } catch (e) {
      expect(e).toBeInstanceOf(MissingBindingError);
      expect((e as MissingBindingError).details.suggestion).toBeUndefined();
    }
  });

  describe('components depending on providers', () => {
    it('rejects a component injecting a provider', () => {
      const builder = defineModule<Services>()
        .provider('connection', { build: () => 'conn' })
        .component('repository', {
          properties: { connection: inject('connection') },
          build: ({ connection }) => `repo(${connection})`,
        })
        .component('service', {
          properties: { repository: inject('repository') },
          build: ({ repository }) => `service(${repository})`,
        });

      try {
        builder.compose();
        expect.fail('should throw');
      } catch (e) {
        expect(e).toBeInstanceOf(ComponentDependsOnProviderError);
        const err = e as ComponentDependsOnProviderError;
        expect(err.details).toEqual({
          component: 'repository',
          provider: 'connection',
          path: ['repository', 'connection'],
        });
        expect(err.message).toBe(
          "Component 'repository' depends on provider 'connection'.\n\nPath: repository -> connection",
        );
      }
    });

    it('reports the full path from the first offending component', () => {
      const builder = defineModule<Services>()
        .component('service', {
          properties: { repository: inject('repository') },
          build: ({ repository }) => `service(${repository})`,
        })
        .component('repository', {
          properties: { connection: inject('connection') },
          build: ({ connection }) => `repo(${connection})`,
        })
        .asyncProvider('connection', { build: async () => 'conn' });

      try {
        builder.compose();
        expect.fail('should throw');
      } catch (e) {
        expect(e).toBeInstanceOf(ComponentDependsOnProviderError);
        expect((e as ComponentDependsOnProviderError).details.path).toEqual([
          'service',
          'repository',
          'connection',
        ]);
      }
    });

    it('allows providers to depend on components', () => {
      const definition = defineModule<Services>()
        .component('connection', { build: () => 'pool' })
        .provider('session', {
          properties: { pool: inject('connection') },
          build: ({ pool }) => `session(${pool})`,
        })
        .compose();

      expect(definition.build().provide('session')).toBe('session(pool)');
    });
  });

  describe('property kinds', () => {
    it('rejects provided() pointing at a component', () => {
      const builder = defineModule<Services>()
        .component('connection', { build: () => 'pool' })
        .provider('session', {
          properties: { connection: provided('connection') },
          build: ({ connection }) => connection,
        });

      try {
        builder.compose();
        expect.fail('should throw');
      } catch (e) {
        expect(e).toBeInstanceOf(DependencyKindError);
        const err = e as DependencyKindError;
        expect(err.details).toEqual({
          from: 'session',
          property: 'connection',
          key: 'connection',
          expected: ['provider'],
          actual: 'component',
        });
        expect(err.hint).toBe(
          "Use inject('connection') for a component dependency.",
        );
      }
    });

    it('rejects inject() pointing at a provider from a provider', () => {
      const builder = defineModule<Services>()
        .provider('connection', { build: () => 'conn' })
        .provider('session', {
          properties: { connection: inject('connection') },
          build: ({ connection }) => connection,
        });

      try {
        builder.compose();
        expect.fail('should throw');
      } catch (e) {
        expect(e).toBeInstanceOf(DependencyKindError);
        const err = e as DependencyKindError;
        expect(err.message).toBe(
          "'session' property 'connection' expects component 'connection', but it is bound as a provider.",
        );
      }
    });

    it('rejects a sync provider depending on an async provider', () => {
      const builder = defineModule<Services>()
        .asyncProvider('connection', { build: async () => 'conn' })
        .provider('session', {
          properties: { connection: provided('connection') },
          build: ({ connection }) => connection,
        });

      try {
        builder.compose();
        expect.fail('should throw');
      } catch (e) {
        expect(e).toBeInstanceOf(DependencyKindError);
        const err = e as DependencyKindError;
        expect(err.details.actual).toBe('async-provider');
        expect(err.hint).toBe(
          "Only async providers can await 'connection'. Register 'session' with asyncProvider().",
        );
      }
    });
  });

  describe('cycles', () => {
    it('rejects a cycle between components', () => {
      const builder = defineModule<Services>()
        .component('service', {
          properties: { repository: inject('repository') },
          build: ({ repository }) => repository,
        })
        .component('repository', {
          properties: { service: inject('service') },
          build: ({ service }) => service,
        });

      try {
        builder.compose();
        expect.fail('should throw');
      } catch (e) {
        expect(e).toBeInstanceOf(CircularDependencyError);
        const err = e as CircularDependencyError;
        expect(err.details.cycle).toBe('service -> repository -> service');
        expect(err.message).toBe(
          "Circular dependency detected while composing 'service'.\n\nCycle: service -> repository -> service",
        );
      }
    });

    it('rejects a cycle between providers', () => {
      const builder = defineModule<Services>()
        .provider('session', {
          properties: { connection: provided('connection') },
          build: ({ connection }) => connection,
        })
        .provider('connection', {
          properties: { session: provided('session') },
          build: ({ session }) => session,
        });

      expect(() => builder.compose()).toThrow(CircularDependencyError);
    });

    it('rejects a binding that depends on itself', () => {
      const builder = defineModule<Services>().component('service', {
        properties: { self: inject('service') },
        build: ({ self }) => self,
      });

      try {
        builder.compose();
        expect.fail('should throw');
      } catch (e) {
        expect(e).toBeInstanceOf(CircularDependencyError);
        expect((e as CircularDependencyError).details.cycle).toBe(
          'service -> service',
        );
      }
    });

    it('reports only the cycle part of a longer chain', () => {
      const builder = defineModule<Services>()
        .component('output', {
          properties: { writer: inject('writer') },
          build: ({ writer }) => writer,
        })
        .component('writer', {
          properties: { service: inject('service') },
          build: ({ service }) => service,
        })
        .component('service', {
          properties: { writer: inject('writer') },
          build: ({ writer }) => writer,
        });

      try {
        builder.compose();
        expect.fail('should throw');
      } catch (e) {
        const err = e as CircularDependencyError;
        expect(err.details.chain).toEqual(['output', 'writer', 'service']);
        expect(err.details.cycle).toBe('writer -> service -> writer');
      }
    });
  });

  describe('parameters', () => {
    it('requires provider parameters to have a default', () => {
      const builder = defineModule<Services>().provider('session', {
        properties: { ttl: param<number>() },
        build: ({ ttl }) => `session(${ttl})`,
      });

      try {
        builder.compose();
        expect.fail('should throw');
      } catch (e) {
        expect(e).toBeInstanceOf(MissingParameterError);
        expect((e as MissingParameterError).details).toEqual({
          key: 'session',
          parameter: 'ttl',
          kind: 'provider',
        });
      }
    });

    it('passes provider parameter defaults to build', () => {
      const definition = defineModule<Services>()
        .provider('session', {
          properties: { ttl: param(30) },
          build: ({ ttl }) => `session(${ttl})`,
        })
        .compose();

      expect(definition.build().provide('session')).toBe('session(30)');
    });
  });

  describe('malformed definitions', () => {
    it('rejects a property not declared with a helper', () => {
      const properties = { output: { kind: 'inject', key: 'output' } };
      type Declared = { output: InjectProperty<'output'> };

      expect(() =>
        defineModule<Services>().component('writer', {
          properties: properties as unknown as Declared,
          build: ({ output }) => output,
        }),
      ).toThrow(InvalidBindingError);
    });

    it('rejects integer-like property names', () => {
      try {
        defineModule<Services>().component('service', {
          properties: { '2': inject('repository'), '1': inject('connection') },
          build: (values) => `${values['2']}:${values['1']}`,
        });
        expect.fail('should throw');
      } catch (e) {
        expect(e).toBeInstanceOf(InvalidBindingError);
        const err = e as InvalidBindingError;
        expect(err.details).toEqual({
          key: 'service',
          reason:
            "property '1' has an integer-like name, which does not keep its declaration order",
        });
        expect(err.hint).toBe(
          'Declare properties with inject(), provided() and param(), and give every binding a build function.',
        );
      }
    });

    it('accepts names that only look numeric in part', () => {
      const module = defineModule<Services>()
        .component('connection', { build: () => 'conn' })
        .component('service', {
          properties: { v2: inject('connection'), '01': param('x') },
          build: ({ v2, '01': zero }) => `${v2}-${zero}`,
        })
        .compose()
        .build();

      expect(module.resolve('service')).toBe('conn-x');
    });
  });

  it('lists bound keys and their kinds', () => {
    const definition = defineModule<Services>()
      .component('output', { build: () => 'console' })
      .provider('session', { build: () => 'session' })
      .asyncProvider('connection', { build: async () => 'conn' })
      .compose();

    expect(definition.keys()).toEqual(['output', 'session', 'connection']);
    expect(definition.kindOf('connection')).toBe('async-provider');
    expect(definition.kindOf('writer')).toBeUndefined();
  });
});
