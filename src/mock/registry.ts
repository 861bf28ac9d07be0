import { Mutex } from 'async-mutex';
import logger from '../logger.js';
import type { TestReporter } from '../reporter.js';
import { DEFAULT_METHOD, MockEntry } from './MockEntry.js';
import type { MockRequest, MockResponse, Responder, StatusProducer } from './types.js';

function requestKey(method: string, path: string): string {
  return `${method} ${path}`;
}

/** The request path with percent-escapes decoded; malformed escapes leave it as sent. */
function decodedPath(req: MockRequest): string {
  try {
    return decodeURIComponent(req.path);
  } catch {
    return req.path;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Filtered entries come before unconditional ones; registration order is
 * kept within each group (Array.prototype.sort is stable).
 */
function withFiltersFirst(entries: MockEntry[]): MockEntry[] {
  return entries.sort((a, b) => Number(b.hasFilter) - Number(a.hasFilter));
}

export type UnmatchedRequest = {
  method: string;
  path: string;
  count: number;
};

export class MockRegistry {
  private readonly entryList: MockEntry[] = [];
  private readonly unmatched = new Map<string, UnmatchedRequest>();
  private readonly guard = new Mutex();

  /**
   * Registers a GET entry answering with `body`. Each producer serves one
   * call, in order, and picks its status code; once all have been used the
   * entry stops matching. Without producers the entry matches indefinitely.
   */
  mock(path: string, body: string, ...producers: StatusProducer[]): MockEntry {
    return this.add(MockEntry.withBody(path, body, producers));
  }

  /**
   * Registers a GET entry whose response is written entirely by `responder`.
   * Headers set on the entry are applied before the responder runs.
   */
  mockFunc(path: string, responder: Responder): MockEntry {
    return this.add(MockEntry.withResponder(path, responder));
  }

  private add(entry: MockEntry): MockEntry {
    this.entryList.push(entry);
    logger.debug(`[mock] registered ${entry.path}`, { entries: this.entryList.length });
    return entry;
  }

  entries(): readonly MockEntry[] {
    return [...this.entryList];
  }

  unmatchedRequests(): UnmatchedRequest[] {
    return [...this.unmatched.values()].map((u) => ({ ...u }));
  }

  /**
   * Routes one request to the first live entry that accepts it, or answers 404.
   * Whole dispatches are serialised, so the depletion check and the call count
   * increment of concurrent requests never interleave.
   */
  dispatch(req: MockRequest, res: MockResponse): Promise<void> {
    return this.guard.runExclusive(() => this.dispatchLocked(req, res));
  }

  private async dispatchLocked(req: MockRequest, res: MockResponse): Promise<void> {
    const method = req.method;
    const path = decodedPath(req);

    const live: MockEntry[] = [];
    let depleted = 0;
    for (const entry of this.entryList) {
      if (!entry.matches(method, path)) continue;
      if (entry.isDepleted()) {
        depleted++;
        continue;
      }
      live.push(entry);
    }

    const selected = withFiltersFirst(live).find((entry) => entry.accepts(req));

    if (!selected) {
      if (depleted > 0) {
        logger.warn(
          `[mock] no more mock responses available for ${method} ${path}; all have reached their call limit`,
          { depleted }
        );
      }
      this.recordUnmatched(method, path);
      res.status(404).setHeader('content-type', 'text/plain; charset=utf-8');
      res.end(`${path} not found`);
      return;
    }

    try {
      await selected.respond(req, res);
      logger.debug(`[mock] ${method} ${path} → mocked ${res.statusCode}`, {
        callCount: selected.callCount,
      });
    } catch (e) {
      logger.error(`[mock] responder for ${method} ${path} failed: ${describeError(e)}`);
      if (!res.headersSent) {
        res.status(500).setHeader('content-type', 'text/plain; charset=utf-8');
        res.end(`mock responder failed: ${describeError(e)}`);
      }
    }
  }

  private recordUnmatched(method: string, path: string): void {
    const key = requestKey(method, path);
    const existing = this.unmatched.get(key);
    if (existing) {
      existing.count++;
    } else {
      this.unmatched.set(key, { method, path, count: 1 });
    }
    logger.warn(`[mock] ${key} is not mocked`);
  }

  /**
   * Checks the combined call count of every entry for `method` and `path`,
   * and marks those entries as asserted.
   */
  assertCallCount(reporter: TestReporter, method: string, path: string, expected: number): void {
    let count = 0;
    for (const entry of this.entryList) {
      if (entry.matches(method, path)) {
        count += entry.callCount;
        entry.markAsserted();
      }
    }
    if (count === 0) {
      reporter.error(`mocked but never called path: ${path} method: ${method}`);
      return;
    }
    if (count !== expected) {
      reporter.error(
        `url: ${method} ${path} expected to be called ${expected} times. It was called ${count} times`
      );
    }
  }

  /** Reports every entry no call count assertion has covered. */
  assertCallCountAsserted(reporter: TestReporter): void {
    for (const entry of this.entryList) {
      if (entry.asserted) continue;
      reporter.error(
        `url: ${entry.path} is mocked but never asserted. It was called ${entry.callCount} times\n` +
          `assert it with: .assertCallCount(reporter, "${entry.method}", "${entry.path}", ${entry.callCount})`
      );
    }
  }

  /** Reports every method and path that was requested without a matching entry. */
  assertNoMissingMocks(reporter: TestReporter): void {
    for (const { method, path, count } of this.unmatched.values()) {
      const suggestion =
        method === DEFAULT_METHOD
          ? `.mock("${path}", "response")`
          : `.mock("${path}", "response").setMethod("${method}")`;
      reporter.error(
        `url: ${requestKey(method, path)} is called but not mocked. It was called ${count} times\n` +
          `create a mock with: ${suggestion}`
      );
    }
  }

  /** Reports entries that were never called, unless a test asserted on them. */
  assertMocksCalled(reporter: TestReporter): void {
    for (const entry of this.entryList) {
      if (entry.callCount === 0 && !entry.asserted) {
        reporter.error(`${entry.method} ${entry.path} mocked but never called.`);
      }
    }
  }
}
