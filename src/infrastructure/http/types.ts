import { RequestInit, Response } from 'node-fetch';

/**
 * The subset of `fetch` the HTTP clients rely on. Injected so tests can
 * answer requests in-process.
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;
