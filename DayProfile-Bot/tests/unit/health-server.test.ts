import { describe, it, expect, afterEach } from 'vitest';
import { HealthServer } from '../../src/health/server.js';
import { createTestLogger } from '../helpers/stub-engine.js';

describe('HealthServer', () => {
  let server: HealthServer | null = null;

  afterEach(async () => {
    await server?.stop();
    server = null;
  });

  async function startServer() {
    const log = createTestLogger();
    const instance = new HealthServer(0, log.logger);
    server = instance;
    await instance.start();
    const port = instance.listeningPort();
    if (port === null) throw new Error('server did not bind');
    return { log, base: `http://127.0.0.1:${port}` };
  }

  it('answers OK on any path', async () => {
    const { base } = await startServer();
    for (const path of ['/', '/health', '/some/deep/path?probe=1']) {
      const response = await fetch(`${base}${path}`);
      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toMatch(/^text\/plain/);
      expect(await response.text()).toBe('OK');
    }
  });

  it('answers OK for any method', async () => {
    const { base } = await startServer();
    for (const method of ['POST', 'PUT', 'DELETE']) {
      const response = await fetch(`${base}/health`, { method });
      expect(response.status).toBe(200);
      expect(await response.text()).toBe('OK');
    }
  });

  it('does not log requests', async () => {
    const { base, log } = await startServer();
    const callsAfterStart = log.info.mock.calls.length;
    await fetch(`${base}/ping`);
    await fetch(`${base}/ping`);
    expect(log.info.mock.calls.length).toBe(callsAfterStart);
    expect(log.debug).not.toHaveBeenCalled();
  });

  it('releases the port on stop', async () => {
    await startServer();
    await server?.stop();
    expect(server?.listeningPort()).toBeNull();
  });
});
