import { ExecutorRegistryError } from '../errors.js';
import { NodeExecutor } from './node.js';
import { SclangExecutor } from './sclang.js';
import { ShellExecutor } from './shell.js';
import { StaticExecutor } from './static.js';
import type { Executor } from './types.js';

export type ExecutorFactory = () => Executor;

/**
 * Name -> factory table. Registration is explicit; a name registered twice is
 * an error rather than a silent override.
 */
export class ExecutorRegistry {
  private readonly factories = new Map<string, ExecutorFactory>();

  register(name: string, factory: ExecutorFactory): this {
    if (this.factories.has(name)) {
      throw new ExecutorRegistryError('EXECUTOR_DUPLICATE', `Executor already registered: ${name}`, { name });
    }
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  /** Returns a fresh instance; executors are never shared across contracts. */
  create(name: string): Executor {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new ExecutorRegistryError('EXECUTOR_UNKNOWN', `No executor registered for '${name}'`, {
        name,
        available: this.available()
      });
    }
    return factory();
  }

  available(): string[] {
    return [...this.factories.keys()].sort();
  }
}

export function createDefaultRegistry(): ExecutorRegistry {
  return new ExecutorRegistry()
    .register('node', () => new NodeExecutor())
    .register('shell', () => new ShellExecutor())
    .register('static', () => new StaticExecutor())
    .register('sclang', () => new SclangExecutor());
}
