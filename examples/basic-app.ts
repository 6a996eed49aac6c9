/**
 * wirebox v1.0.0 - Basic Example
 *
 * Demonstrates the core container concepts:
 * - Instance bindings
 * - Interface bindings through InjectionToken
 * - Structural construction from decorator metadata
 * - Walking the cause chain of a failed resolution
 */

import 'reflect-metadata';

import {
  Container,
  Inject,
  Injectable,
  InjectionError,
  InjectionToken,
  consoleLogger,
  getCauseChain,
} from '../src/index';

// ==================== Configuration ====================

class AppConfig {
  constructor(
    public readonly greeting: string,
    public readonly audience: string,
  ) {}
}

// ==================== Interfaces ====================

interface MessageSink {
  write(line: string): void;
}

const MESSAGE_SINK = new InjectionToken<MessageSink>('MessageSink');

@Injectable()
class StdoutSink implements MessageSink {
  write(line: string): void {
    console.log(`  > ${line}`);
  }
}

// ==================== Services ====================

@Injectable()
class Greeter {
  constructor(
    private readonly config: AppConfig,
    @Inject(MESSAGE_SINK) private readonly sink: MessageSink,
  ) {}

  greet(): void {
    this.sink.write(`${this.config.greeting}, ${this.config.audience}!`);
  }
}

@Injectable()
class Mailer {
  constructor(public readonly config: AppConfig) {
    throw new Error('SMTP host is not configured');
  }
}

// ==================== Main Application ====================

function main(): void {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  wirebox v1.0.0 - Container Demo');
  console.log('═══════════════════════════════════════════════════════════\n');

  const container = new Container({ name: 'demo', logger: consoleLogger, detectCycles: true })
    .bindInstance(AppConfig, new AppConfig('Hello', 'world'))
    .bindAlias(MESSAGE_SINK, StdoutSink);

  console.log('--- Resolve Greeter ---');
  container.resolve(Greeter).greet();
  console.log();

  console.log('--- Resolve Mailer (constructor fails) ---');
  try {
    container.resolve(Mailer);
  } catch (error) {
    if (!(error instanceof InjectionError)) {
      throw error;
    }
    getCauseChain(error).forEach((link, depth) => {
      const text = link instanceof Error ? `${link.name}: ${link.message}` : String(link);
      console.log(`${'  '.repeat(depth)}└─ ${text}`);
    });
  }

  console.log('\n═══════════════════════════════════════════════════════════');
  console.log('  Demo Complete!');
  console.log('═══════════════════════════════════════════════════════════\n');
}

main();
