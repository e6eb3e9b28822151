/**
 * HTTP connection management for Sluice connectors.
 *
 * Provides keep-alive connection pooling via undici Agent.
 * Each connector should create its own agent during init() and
 * close it during shutdown() for proper lifecycle management.
 */

import { Agent, type Dispatcher, type RequestInit, type Response, fetch } from 'undici';

/**
 * Opaque handle for an HTTP connection pool agent.
 * Connectors store this and pass it to closeHttpAgent() on shutdown.
 */
export type HttpAgent = Dispatcher;

/** Options for creating an HTTP agent with connection pooling */
export interface HttpAgentOptions {
	/** Max connections per origin (default: 10) */
	connections?: number;
	/** Keep-alive timeout in milliseconds (default: 30000) */
	keepAliveTimeout?: number;
	/** Max keep-alive timeout in milliseconds (default: 60000) */
	keepAliveMaxTimeout?: number;
	/** Headers timeout in milliseconds (default: 300000) */
	headersTimeout?: number;
}

/** Default keep-alive agent options */
const DEFAULTS: Required<HttpAgentOptions> = {
	connections: 10,
	keepAliveTimeout: 30_000,
	keepAliveMaxTimeout: 60_000,
	headersTimeout: 300_000,
};

/**
 * Create an undici Agent with keep-alive connection pooling.
 *
 * Usage:
 * ```ts
 * const agent = createHttpAgent({ connections: 5 });
 * const response = await fetchWithAgent(agent, url);
 * // On shutdown:
 * await closeHttpAgent(agent);
 * ```
 */
export function createHttpAgent(options?: HttpAgentOptions): HttpAgent {
	const opts = { ...DEFAULTS, ...options };
	return new Agent({
		keepAliveTimeout: opts.keepAliveTimeout,
		keepAliveMaxTimeout: opts.keepAliveMaxTimeout,
		headersTimeout: opts.headersTimeout,
		connections: opts.connections,
	});
}

/** Issue a request through the given agent. */
export function fetchWithAgent(
	agent: HttpAgent,
	url: string | URL,
	init?: Omit<RequestInit, 'dispatcher'>,
): Promise<Response> {
	return fetch(url, { ...init, dispatcher: agent });
}

/**
 * Close an HTTP agent, draining active connections.
 */
export async function closeHttpAgent(agent: HttpAgent): Promise<void> {
	await agent.close();
}
