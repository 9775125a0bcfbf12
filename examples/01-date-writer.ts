/**
 * Example 01: Date writer
 *
 * Showcases: contract interface, component parameters, overrides,
 * introspection, fuzzy error on a typo'd key.
 */
import { pino } from 'pino';
import {
  BindingNotFoundError,
  defineModule,
  inject,
  param,
} from '../src/index.js';

// ── Domain interfaces (the contract) ────────────────────────────────────────

interface Output {
  write(line: string): void;
}

interface DateWriter {
  writeDate(): void;
}

interface AppServices {
  output: Output;
  writer: DateWriter;
}

// ── Implementations ─────────────────────────────────────────────────────────

class ConsoleOutput implements Output {
  write(line: string) { console.log(line); }
}

class TodayWriter implements DateWriter {
  constructor(
    private output: Output,
    private today: string,
    private year: number,
  ) {}
  writeDate() { this.output.write(`Today is ${this.today}, ${this.year}`); }
}

// ── Module definition ───────────────────────────────────────────────────────

const DateModule = defineModule<AppServices>()
  .component('output', {
    implementation: 'ConsoleOutput',
    build: () => new ConsoleOutput(),
  })
  .component('writer', {
    implementation: 'TodayWriter',
    properties: {
      output: inject('output'),
      today: param('Jan 1'),
      year: param(1970),
    },
    build: ({ output, today, year }) => new TodayWriter(output, today, year),
  })
  .compose();

// ── Main ────────────────────────────────────────────────────────────────────

function main() {
  // 1. Defaults
  console.log('=== Defaults ===');
  DateModule.build().resolve('writer').writeDate();

  // 2. Parameters, with debug logging
  console.log('\n=== Parameters ===');
  const logger = pino({ level: 'debug' });
  const module = DateModule.builder({ name: 'dates', logger })
    .withComponentParameters('writer', { today: 'June 19', year: 2020 })
    .build();
  module.resolve('writer').writeDate();

  // 3. Instance override
  console.log('\n=== Override ===');
  const lines: string[] = [];
  const captured = DateModule.builder()
    .withComponentOverride('output', { write: (line) => lines.push(line) })
    .build();
  captured.resolve('writer').writeDate();
  console.log(`captured: ${JSON.stringify(lines)}`);

  // 4. Introspection
  console.log('\n=== Introspection ===');
  console.log(String(module));
  console.log(JSON.stringify(module.describe('writer'), null, 2));

  // 5. Fuzzy error on a typo'd key
  console.log('\n=== Fuzzy suggestion ===');
  try {
    // @ts-expect-error intentional typo
    module.describe('writr');
  } catch (e) {
    if (e instanceof BindingNotFoundError) {
      console.log(`error: ${e.message.split('\n')[0]}`);
      console.log(`hint: ${e.hint}`);
    }
  }
}

main();
