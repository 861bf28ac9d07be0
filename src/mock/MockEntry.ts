import type { TestReporter } from '../reporter.js';
import type {
  MockRequest,
  MockResponse,
  RequestFilter,
  Responder,
  ResponseStrategy,
  StatusProducer,
} from './types.js';

export const DEFAULT_METHOD = 'GET';

/**
 * One registered expectation: what it matches, how it responds, how often it
 * may match, and how often it has.
 *
 * Configuration methods return the entry so they can be chained:
 *
 * ```typescript
 * server.mock('/users', '[]').setMethod('POST').setHeader('x-trace', 'abc').once();
 * ```
 *
 * Configure an entry before traffic reaches it; the registry reads the
 * configuration on every dispatch.
 */
export class MockEntry {
  readonly path: string;
  private readonly strategy: ResponseStrategy;
  private readonly headerValues = new Map<string, string>([['content-type', 'application/json']]);
  private methodValue = DEFAULT_METHOD;
  private filterFn: RequestFilter | undefined;
  private budget: number | undefined;
  private calls = 0;
  private assertedFlag = false;

  private constructor(path: string, strategy: ResponseStrategy) {
    this.path = path;
    this.strategy = strategy;
  }

  static withBody(path: string, body: string, producers: readonly StatusProducer[] = []): MockEntry {
    return new MockEntry(path, { kind: 'static', body, producers: [...producers] });
  }

  static withResponder(path: string, responder: Responder): MockEntry {
    return new MockEntry(path, { kind: 'custom', responder });
  }

  get method(): string {
    return this.methodValue;
  }

  get callCount(): number {
    return this.calls;
  }

  get asserted(): boolean {
    return this.assertedFlag;
  }

  get hasFilter(): boolean {
    return this.filterFn !== undefined;
  }

  get headers(): Record<string, string> {
    return Object.fromEntries(this.headerValues);
  }

  /** Header names are stored lower-cased, as Node sends them. */
  setHeader(name: string, value: string): this {
    this.headerValues.set(name.toLowerCase(), value);
    return this;
  }

  setMethod(method: string): this {
    this.methodValue = method;
    return this;
  }

  filter(predicate: RequestFilter): this {
    this.filterFn = predicate;
    return this;
  }

  once(): this {
    this.budget = 1;
    return this;
  }

  /** Limits the entry to `n` matches. `0` removes the limit; a negative `n` never matches. */
  times(n: number): this {
    this.budget = n === 0 ? undefined : n;
    return this;
  }

  matches(method: string, path: string): boolean {
    return this.path === path && this.methodValue === method;
  }

  /**
   * True once the call budget is spent, or once every per-call producer has
   * served its call.
   */
  isDepleted(): boolean {
    if (this.budget !== undefined && this.calls >= this.budget) {
      return true;
    }
    if (this.strategy.kind !== 'static' || this.strategy.producers.length === 0) {
      return false;
    }
    return this.calls >= this.strategy.producers.length;
  }

  accepts(req: MockRequest): boolean {
    return this.filterFn === undefined || this.filterFn(req);
  }

  /**
   * Writes this entry's response for one matched request and counts the call.
   * The registry calls this while holding its guard, right after selecting the entry.
   */
  async respond(req: MockRequest, res: MockResponse): Promise<void> {
    for (const [name, value] of this.headerValues) {
      res.setHeader(name, value);
    }
    this.calls++;

    switch (this.strategy.kind) {
      case 'custom':
        await this.strategy.responder(req, res);
        if (!res.writableEnded) {
          res.end();
        }
        return;
      case 'static': {
        const producer = this.strategy.producers[this.calls - 1];
        const status = producer ? producer(req) : 0;
        if (status !== 0) {
          res.status(status);
        }
        res.end(this.strategy.body);
        return;
      }
    }
  }

  markAsserted(): void {
    this.assertedFlag = true;
  }

  assertCallCount(reporter: TestReporter, expected: number): void {
    this.assertedFlag = true;

    if (this.calls === 0) {
      reporter.error(`url: ${this.path} is mocked but never called. It was called ${this.calls} times`);
      return;
    }
    if (this.calls !== expected) {
      reporter.error(
        `url: ${this.path} expected to be called ${expected} times. It was called ${this.calls} times`
      );
    }
  }
}
