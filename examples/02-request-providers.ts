/**
 * Example 02: Request providers
 *
 * Showcases: providers built per request, async providers awaiting their
 * dependencies in order, provider overrides for tests.
 */
import { defineModule, inject, provided } from '../src/index.js';

interface Config {
  dsn: string;
}

interface Connection {
  id: number;
  query(sql: string): Promise<string[]>;
}

interface UserRepository {
  names(): Promise<string[]>;
}

interface AppServices {
  config: Config;
  connection: Connection;
  users: UserRepository;
}

let opened = 0;

const AppModule = defineModule<AppServices>()
  .component('config', { build: () => ({ dsn: 'mem://example' }) })
  .asyncProvider('connection', {
    properties: { config: inject('config') },
    build: async ({ config }) => {
      const id = ++opened;
      console.log(`[connection ${id}] open ${config.dsn}`);
      return { id, query: async (sql) => [`${sql} via #${id}`] };
    },
  })
  .asyncProvider('users', {
    properties: { connection: provided('connection') },
    build: async ({ connection }) => ({
      names: () => connection.query('SELECT name FROM users'),
    }),
  })
  .compose();

async function main() {
  const module = AppModule.build({ name: 'requests' });

  // Every request gets its own repository and connection; config is shared.
  for (const request of [1, 2]) {
    const users = await module.asyncProvide('users');
    console.log(`request ${request}:`, await users.names());
  }

  // Tests replace the connection without touching the repository binding.
  const testModule = AppModule.builder()
    .withAsyncProviderOverride('connection', async () => ({
      id: 0,
      query: async () => ['Alice', 'Bob'],
    }))
    .build();
  const users = await testModule.asyncProvide('users');
  console.log('test:', await users.names());
}

main().catch(console.error);
