import { type Server, createServer } from 'node:http';
import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';
import { closeHttpAgent, createHttpAgent, fetchWithAgent } from '../http.js';

describe('createHttpAgent', () => {
	const agents: ReturnType<typeof createHttpAgent>[] = [];

	afterEach(async () => {
		for (const agent of agents) {
			await agent.close();
		}
		agents.length = 0;
	});

	it('creates an agent with default options', () => {
		const agent = createHttpAgent();
		agents.push(agent);
		expect(typeof agent.close).toBe('function');
		expect(typeof agent.dispatch).toBe('function');
	});

	it('accepts partial options', () => {
		const agent = createHttpAgent({ connections: 3 });
		agents.push(agent);
		expect(agent).toBeDefined();
	});
});

describe('fetchWithAgent', () => {
	let server: Server;
	let baseUrl: string;
	const seen: Array<{ method?: string; accept?: string }> = [];

	beforeAll(async () => {
		server = createServer((req, res) => {
			seen.push({ method: req.method, accept: req.headers.accept });
			res.writeHead(200, { 'Content-Type': 'text/plain' });
			res.end('pong');
		});
		await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
		const address = server.address();
		if (address === null || typeof address === 'string') throw new Error('server is not on TCP');
		baseUrl = `http://127.0.0.1:${address.port}`;
	});

	afterAll(async () => {
		await new Promise<void>((resolve) => server.close(() => resolve()));
	});

	it('sends the request through the agent and passes init options', async () => {
		const agent = createHttpAgent();
		const response = await fetchWithAgent(agent, `${baseUrl}/ping`, {
			method: 'POST',
			headers: { Accept: 'text/plain' },
		});

		expect(response.status).toBe(200);
		expect(await response.text()).toBe('pong');
		expect(seen[seen.length - 1]).toEqual({ method: 'POST', accept: 'text/plain' });

		await closeHttpAgent(agent);
	});
});

describe('closeHttpAgent', () => {
	it('closes the agent without error', async () => {
		const agent = createHttpAgent();
		await expect(closeHttpAgent(agent)).resolves.toBeUndefined();
	});
});
