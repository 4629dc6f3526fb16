/**
 * Tests for the control server (HTTP + Socket.IO), bound to an ephemeral port
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { io as connect, type Socket } from 'socket.io-client';
import { ControlServer, type SessionStatus } from '../src/api/control-server.js';
import { ShutdownCoordinator } from '../src/core/shutdown-coordinator.js';

const sessionStatus: SessionStatus = {
  testId: 'test-1',
  testName: 'bench-run',
  startedAt: '2025-10-15T12:00:00.000Z',
  stop: null,
  loops: [
    {
      id: 'scope-1',
      capability: 'scope-channel-group',
      subsystem: 'scope',
      state: 'running',
      coverage: 1,
      windows: 4,
      artifacts: 2,
      gaps: 0,
    },
  ],
};

describe('ControlServer', () => {
  let coordinator: ShutdownCoordinator;
  let server: ControlServer;
  let baseUrl: string;

  beforeEach(async () => {
    coordinator = new ShutdownCoordinator({ graceTimeoutMs: 1000 });
    server = new ControlServer({
      host: '127.0.0.1',
      port: 0,
      stop: coordinator,
      provider: { status: () => sessionStatus },
    });
    const port = await server.start();
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await server.close();
  });

  const postStop = (body: string): Promise<Response> =>
    fetch(`${baseUrl}/stop`, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body });

  describe('HTTP', () => {
    it('reports health with a request id', async () => {
      const res = await fetch(`${baseUrl}/health`, { headers: { 'X-Request-ID': 'req-1' } });

      expect(res.status).toBe(200);
      expect(res.headers.get('x-request-id')).toBe('req-1');
      await expect(res.json()).resolves.toMatchObject({ status: 'healthy' });
    });

    it('serves the session status', async () => {
      const res = await fetch(`${baseUrl}/status`);

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({ success: true, data: sessionStatus });
    });

    it('requests a stop and reports repeats', async () => {
      const first = await postStop(JSON.stringify({ reason: 'bench done' }));
      const second = await postStop('{}');

      expect(first.status).toBe(202);
      await expect(first.json()).resolves.toEqual({ success: true, data: { alreadyRequested: false } });
      await expect(second.json()).resolves.toEqual({ success: true, data: { alreadyRequested: true } });
      expect(coordinator.stopRequest).toMatchObject({ source: 'operator', reason: 'bench done' });
    });

    it('rejects unknown fields in a stop request', async () => {
      const res = await postStop(JSON.stringify({ force: true }));

      expect(res.status).toBe(400);
      await expect(res.json()).resolves.toMatchObject({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Invalid stop request', issues: [expect.any(String)] },
      });
      expect(coordinator.isStopRequested()).toBe(false);
    });

    it('rejects a malformed body', async () => {
      const res = await postStop('{ nope');

      expect(res.status).toBe(400);
      await expect(res.json()).resolves.toMatchObject({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Malformed request body' },
      });
    });

    it('answers unknown routes with 404', async () => {
      const res = await fetch(`${baseUrl}/nope`);

      expect(res.status).toBe(404);
      await expect(res.json()).resolves.toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Endpoint not found: GET /nope' },
      });
    });
  });

  describe('Socket.IO', () => {
    let client: Socket;

    afterEach(() => {
      client.disconnect();
    });

    function connectClient(): Promise<SessionStatus> {
      client = connect(`${baseUrl}/capture`, { transports: ['websocket'], reconnection: false });
      return new Promise((resolve) => client.once('status', resolve));
    }

    it('sends the status on connect and relays broadcasts', async () => {
      const status = await connectClient();
      expect(status).toEqual(sessionStatus);

      const relayed = new Promise((resolve) => client.once('loop:state', resolve));
      server.broadcast('loop:state', { id: 'scope-1', state: 'stopping' });

      await expect(relayed).resolves.toEqual({ id: 'scope-1', state: 'stopping' });
    });

    it('accepts a stop message and acknowledges it', async () => {
      await connectClient();

      const ack = await client.timeout(2000).emitWithAck('stop', { reason: 'from the bench tablet' });

      expect(ack).toEqual({ accepted: true, alreadyRequested: false });
      expect(coordinator.stopRequest).toMatchObject({ source: 'operator', reason: 'from the bench tablet' });
    });
  });
});
