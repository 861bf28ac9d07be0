import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'http';
import logger from './logger.js';
import {
  resolveServerOptions,
  type MockServerOptions,
  type ResolvedMockServerOptions,
} from './config.js';
import { MockRegistry } from './mock/registry.js';
import type { MockEntry } from './mock/MockEntry.js';
import type { Responder, StatusProducer } from './mock/types.js';
import type { TestReporter } from './reporter.js';

function formatHost(host: string): string {
  return host.includes(':') ? `[${host}]` : host;
}

/**
 * Local HTTP server that answers every request from its {@link MockRegistry}.
 *
 * @example
 * ```typescript
 * const server = await createMockServer();
 * server.mock('/health', '{"ok":true}');
 *
 * await fetch(`${server.url()}/health`);
 *
 * server.assertCallCount(reporter, 'GET', '/health', 1);
 * await server.close();
 * ```
 */
export class MockServer {
  readonly registry: MockRegistry;
  private readonly options: ResolvedMockServerOptions;
  private readonly app: Express;
  private server: Server | null = null;
  private baseUrl: string | null = null;

  constructor(options: MockServerOptions = {}, registry: MockRegistry = new MockRegistry()) {
    this.options = resolveServerOptions(options);
    this.registry = registry;
    this.app = express();
    this.app.disable('x-powered-by');

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      res.on('error', (error) => {
        logger.error(`[mock] failed writing response for ${req.method} ${req.path}: ${error.message}`);
      });
      this.registry.dispatch(req, res).catch(next);
    });

    // Only reached when dispatch itself rejects
    this.app.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
      logger.error(`[mock] dispatch failed for ${req.method} ${req.path}: ${error.message}`);
      if (!res.headersSent) {
        res.status(500).end();
      }
    });
  }

  async start(): Promise<void> {
    if (this.server) return;
    const { host, port } = this.options;

    const server = await new Promise<Server>((resolve, reject) => {
      const s = this.app.listen(port, host);
      s.once('listening', () => {
        s.off('error', reject);
        s.on('error', (error) => {
          logger.error(`[mock] server error: ${error.message}`);
        });
        resolve(s);
      });
      s.once('error', reject);
    });

    const address = server.address();
    if (!address || typeof address === 'string') {
      server.close();
      throw new Error(`MockServer expected a TCP address, got ${String(address)}`);
    }
    this.server = server;
    this.baseUrl = `http://${formatHost(host)}:${address.port}`;
    logger.info(`[mock] server listening on ${this.baseUrl}`);
  }

  url(): string {
    if (!this.baseUrl) {
      throw new Error('MockServer is not listening. Call start() first.');
    }
    return this.baseUrl;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      // Keep-alive sockets from fetch would otherwise hold close() open
      server.closeIdleConnections();
    });
    logger.info(`[mock] server on ${this.baseUrl} stopped`);
    this.baseUrl = null;
  }

  mock(path: string, body: string, ...producers: StatusProducer[]): MockEntry {
    return this.registry.mock(path, body, ...producers);
  }

  mockFunc(path: string, responder: Responder): MockEntry {
    return this.registry.mockFunc(path, responder);
  }

  assertCallCount(reporter: TestReporter, method: string, path: string, expected: number): void {
    this.registry.assertCallCount(reporter, method, path, expected);
  }

  assertCallCountAsserted(reporter: TestReporter): void {
    this.registry.assertCallCountAsserted(reporter);
  }

  assertNoMissingMocks(reporter: TestReporter): void {
    this.registry.assertNoMissingMocks(reporter);
  }

  assertMocksCalled(reporter: TestReporter): void {
    this.registry.assertMocksCalled(reporter);
  }

  /** End-of-test sweep: missing mocks, then uncalled mocks, then unasserted mocks. */
  assertAll(reporter: TestReporter): void {
    this.registry.assertNoMissingMocks(reporter);
    this.registry.assertMocksCalled(reporter);
    this.registry.assertCallCountAsserted(reporter);
  }
}

export async function createMockServer(options: MockServerOptions = {}): Promise<MockServer> {
  const server = new MockServer(options);
  await server.start();
  return server;
}
