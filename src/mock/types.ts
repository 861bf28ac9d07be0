import type { Request, Response } from 'express';

export type MockRequest = Request;
export type MockResponse = Response;

/** Decides whether an entry accepts a request that already matched its method and path. */
export type RequestFilter = (req: MockRequest) => boolean;

/** Serves one call of a static entry; a non-zero return value becomes the status code. */
export type StatusProducer = (req: MockRequest) => number;

/** Fully owns the response of a custom entry. */
export type Responder = (req: MockRequest, res: MockResponse) => void | Promise<void>;

export type ResponseStrategy =
  | {
      kind: 'static';
      body: string;
      producers: readonly StatusProducer[];
    }
  | {
      kind: 'custom';
      responder: Responder;
    };
