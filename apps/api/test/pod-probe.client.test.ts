import express, { type RequestHandler } from 'express';
import { afterEach, describe, expect, it } from 'vitest';

import { PodProbeClient } from '../src/modules/pods/pod-probe.client.js';
import { RelayError } from '../src/shared/errors.js';
import { closedPort, listen, podInfo, type RunningServer } from './helpers.js';

describe('PodProbeClient', () => {
  let pod: RunningServer | null = null;

  const startPod = async (info: RequestHandler) => {
    const app = express();
    app.get('/api/info', info);
    app.post('/api/probes/:type/:action', (req, res) => {
      res.status(202).json({ probe: req.params.type, action: req.params.action });
    });
    pod = await listen(app);
    return new PodProbeClient({ instancePort: pod.port, timeoutMs: 1000 });
  };

  afterEach(async () => {
    await pod?.close();
    pod = null;
  });

  it('builds instance URLs on the instance port', () => {
    const client = new PodProbeClient({ instancePort: 8080, timeoutMs: 1000 });
    expect(client.instanceUrl('10.0.0.5')).toBe('http://10.0.0.5:8080');
    expect(client.instanceUrl('10.0.0.5', '/api/info')).toBe('http://10.0.0.5:8080/api/info');
    expect(client.instanceUrl('fd00::1', '/api/info')).toBe('http://[fd00::1]:8080/api/info');
  });

  describe('fetchStatus', () => {
    it('decodes a complete status document', async () => {
      const info = podInfo();
      const client = await startPod((_req, res) => {
        res.json(info);
      });

      const result = await client.fetchStatus('127.0.0.1');

      expect(result).toEqual({ ok: true, value: info });
    });

    it('fills absent fields with zero values', async () => {
      const client = await startPod((_req, res) => {
        res.json({ probeStatus: { started: true, live: true, ready: false } });
      });

      const result = await client.fetchStatus('127.0.0.1');

      expect(result).toEqual({
        ok: true,
        value: {
          podName: '',
          podIP: '',
          nodeHostname: '',
          containerAge: 0,
          startTime: '',
          probeStatus: { started: true, live: true, ready: false },
          startupDelay: 0,
          startupReady: '',
        },
      });
    });

    it('reads null fields as zero values', async () => {
      const client = await startPod((_req, res) => {
        res.json({ probeStatus: { started: true, live: true, ready: false }, startupReady: null });
      });

      const result = await client.fetchStatus('127.0.0.1');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.startupReady).toBe('');
      expect(result.value.probeStatus).toEqual({ started: true, live: true, ready: false });
    });

    it('reports a non-200 answer as a status error', async () => {
      const client = await startPod((_req, res) => {
        res.status(503).send('warming up');
      });

      const result = await client.fetchStatus('127.0.0.1');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('status');
      expect(result.error.message).toBe('unexpected status code: 503');
    });

    it('reports a body that is not JSON as a decode error', async () => {
      const client = await startPod((_req, res) => {
        res.type('text/plain').send('not json');
      });

      const result = await client.fetchStatus('127.0.0.1');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('decode');
      expect(result.error.message.startsWith('failed to parse JSON: ')).toBe(true);
    });

    it('reports a field of the wrong type as a decode error', async () => {
      const client = await startPod((_req, res) => {
        res.json({ containerAge: 'old' });
      });

      const result = await client.fetchStatus('127.0.0.1');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('decode');
      expect(result.error.message).toBe('failed to parse JSON: containerAge: Expected number, received string');
    });

    it('reports an unreachable pod as a connect error', async () => {
      const client = new PodProbeClient({ instancePort: await closedPort(), timeoutMs: 1000 });

      const result = await client.fetchStatus('127.0.0.1');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('connect');
      expect(result.error.message.startsWith('failed to connect: ')).toBe(true);
    });

    it('gives up after the timeout', async () => {
      const app = express();
      app.get('/api/info', () => {
        // never answers
      });
      pod = await listen(app);
      const client = new PodProbeClient({ instancePort: pod.port, timeoutMs: 50 });

      const result = await client.fetchStatus('127.0.0.1');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('connect');
      expect(result.error.message).toBe('failed to connect: request timed out after 50ms');
    });
  });

  describe('forward', () => {
    it('returns the remote status, content type and body untouched', async () => {
      const client = await startPod((_req, res) => {
        res.json(podInfo());
      });
      const port = pod?.port ?? 0;

      const response = await client.forward(`http://127.0.0.1:${port}/api/probes/readiness/fail`, 'POST');

      expect(response.status).toBe(202);
      expect(response.contentType).toBe('application/json; charset=utf-8');
      expect(response.body.toString('utf8')).toBe('{"probe":"readiness","action":"fail"}');
    });

    it('throws a RelayError when the pod cannot be reached', async () => {
      const client = new PodProbeClient({ instancePort: 8080, timeoutMs: 1000 });
      const port = await closedPort();

      const call = client.forward(`http://127.0.0.1:${port}/api/probes/startup/recover`, 'POST');

      await expect(call).rejects.toBeInstanceOf(RelayError);
      await expect(call).rejects.toMatchObject({ status: 502 });
      await expect(call).rejects.toThrow(/^Failed to call pod API: /);
    });
  });
});
