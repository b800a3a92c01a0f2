import { describe, expect, it } from 'vitest';

import {
  escapeHtml,
  formatDuration,
  renderDashboard,
  sortForDisplay,
  type DashboardView,
} from '../src/modules/pods/dashboard.view.js';
import { podInfo, statusRecord } from './helpers.js';

const view: DashboardView = {
  build: { version: '1.4.0', commit: 'abc123', buildTime: '2024-05-01T09:00:00Z' },
  labelSelector: 'app=probe-demo',
  instanceUrl: (ip, path = '') => `http://${ip}:8080${path}`,
};

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;',
    );
  });
});

describe('formatDuration', () => {
  it.each([
    [0, '0s'],
    [45_000, '45s'],
    [90_000, '1m 30s'],
    [3_723_000, '1h 2m'],
    [93_600_000, '1d 2h'],
  ])('formats %i ms as %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});

describe('sortForDisplay', () => {
  it('orders by group tag, then name', () => {
    const sorted = sortForDisplay([
      statusRecord({ name: 'web-b-2', replicaSetId: 'b' }),
      statusRecord({ name: 'web-a-2', replicaSetId: 'a' }),
      statusRecord({ name: 'web-b-1', replicaSetId: 'b' }),
      statusRecord({ name: 'web-a-1', replicaSetId: 'a' }),
    ]);

    expect(sorted.map((pod) => pod.name)).toEqual(['web-a-1', 'web-a-2', 'web-b-1', 'web-b-2']);
  });
});

describe('renderDashboard', () => {
  it('shows build information and the refresh control', () => {
    const html = renderDashboard([], view);

    expect(html).toContain('<title>Pod Monitor Dashboard</title>');
    expect(html).toContain('<span>Version: 1.4.0</span>');
    expect(html).toContain('<span>Commit: abc123</span>');
    expect(html).toContain('<span>Built: 2024-05-01T09:00:00Z</span>');
    expect(html).toContain('id="refresh-slider"');
  });

  it('explains an empty snapshot', () => {
    const html = renderDashboard([], view);

    expect(html).toContain('<div class="no-pods">No pods found with label app=probe-demo</div>');
  });

  it('renders a card per pod with probe toggles', () => {
    const pod = statusRecord({
      info: podInfo({ probeStatus: { started: true, live: true, ready: false } }),
    });

    const html = renderDashboard([pod], view);

    expect(html).toContain('<div class="pod-card not-ready">');
    expect(html).toContain('<div class="pod-name">web-7f8c9d-abcde</div>');
    expect(html).toContain('<div class="replica-set-id">ReplicaSet: 7f8c9d</div>');
    expect(html).toContain('<span class="info-value">1m 30s</span>');
    expect(html).toContain('<span class="info-value">5s</span>');
    expect(html).toContain('data-target="http://10.0.0.5:8080/api/probes/startup/fail"');
    expect(html).toContain('data-target="http://10.0.0.5:8080/api/probes/liveness/fail"');
    expect(html).toContain('data-target="http://10.0.0.5:8080/api/probes/readiness/recover"');
    expect(html).toContain(
      'Last check: <time class="local-clock" datetime="2024-05-01T12:00:00.000Z">12:00:00</time>',
    );
  });

  it('marks failing pods and escapes their error', () => {
    const pod = statusRecord({ info: null, error: 'failed to connect: <refused>' });

    const html = renderDashboard([pod], view);

    expect(html).toContain('<div class="pod-card error">');
    expect(html).toContain('<div class="error-message">failed to connect: &lt;refused&gt;</div>');
    expect(html).not.toContain('class="probe-status"');
  });
});
