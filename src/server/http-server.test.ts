/**
 * Tests for the streamable HTTP front end
 */

import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { closeHttpServer, createHttpApp, getListeningPort, startHttpServer } from './http-server';
import { createCompletionMcpServer } from './mcp-server';
import { CompletionService } from '../completion/completion-service';
import { CancellableExecutor } from '../engines/cancellable-executor';
import { MockProcessRunner, createSuccessfulMockRunner } from '../engines/mock-process-runner';
import { BufferLogger } from '../logging/buffer-logger';
import { createTestConfig } from '../../tests/fixtures/test-config';

const ENDPOINT = '/mcp-completion';
const MCP_ACCEPT = 'application/json, text/event-stream';

function createApp(runner: MockProcessRunner = createSuccessfulMockRunner('Hello from llama')) {
  const logger = new BufferLogger();
  const service = new CompletionService({
    config: createTestConfig(),
    executor: new CancellableExecutor({ processRunner: runner }),
    logger,
  });
  return createHttpApp({
    endpoint: ENDPOINT,
    createMcpServer: () => createCompletionMcpServer(service, { name: 'llama-completion-mcp', version: '0.0.0-test' }, logger),
    logger,
  });
}

function rpc(method: string, params: Record<string, unknown>, id = 1) {
  return { jsonrpc: '2.0', id, method, params };
}

describe('createHttpApp', () => {
  it('should answer tools/call with a JSON response', async () => {
    const response = await request(createApp())
      .post(ENDPOINT)
      .set('Accept', MCP_ACCEPT)
      .send(rpc('tools/call', { name: 'generate_completion', arguments: { prompt: 'hi' } }));

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: { content: [{ type: 'text', text: 'Hello from llama' }], isError: false },
    });
  });

  it('should answer tools/list', async () => {
    const response = await request(createApp())
      .post(ENDPOINT)
      .set('Accept', MCP_ACCEPT)
      .send(rpc('tools/list', {}, 7));

    expect(response.status).toBe(200);
    expect(response.body.id).toBe(7);
    expect(response.body.result.tools.map((tool: { name: string }) => tool.name)).toEqual(['generate_completion']);
  });

  it('should serve each request with a fresh server', async () => {
    const runner = createSuccessfulMockRunner('again');
    const app = createApp(runner);
    const call = rpc('tools/call', { name: 'generate_completion', arguments: { prompt: 'hi' } });

    await request(app).post(ENDPOINT).set('Accept', MCP_ACCEPT).send(call);
    const second = await request(app).post(ENDPOINT).set('Accept', MCP_ACCEPT).send(call);

    expect(second.status).toBe(200);
    expect(runner.getCallHistory()).toHaveLength(2);
  });

  it('should refuse GET and DELETE', async () => {
    const app = createApp();

    const get = await request(app).get(ENDPOINT);
    const del = await request(app).delete(ENDPOINT);

    expect(get.status).toBe(405);
    expect(del.status).toBe(405);
    expect(get.body).toEqual({ jsonrpc: '2.0', error: { code: -32000, message: 'Method not allowed.' }, id: null });
  });

  it('should not serve other paths', async () => {
    const response = await request(createApp())
      .post('/other')
      .set('Accept', MCP_ACCEPT)
      .send(rpc('tools/list', {}));

    expect(response.status).toBe(404);
  });
});

describe('startHttpServer', () => {
  it('should bind an ephemeral port and close cleanly', async () => {
    const server = await startHttpServer(createApp(), 0);
    const port = getListeningPort(server);

    expect(port).toBeGreaterThan(0);
    await closeHttpServer(server);
    expect(server.listening).toBe(false);
  });

  it('should reject when the port is taken', async () => {
    const first = await startHttpServer(createApp(), 0);
    const port = getListeningPort(first) ?? 0;

    await expect(startHttpServer(createApp(), port)).rejects.toMatchObject({ code: 'EADDRINUSE' });
    await closeHttpServer(first);
  });
});
