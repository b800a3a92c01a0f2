import type { PodStatusRecord, ProbeType } from '@probe-monitor/common';

export interface BuildInfo {
  version: string;
  commit: string;
  buildTime: string;
}

export interface DashboardView {
  build: BuildInfo;
  labelSelector: string;
  instanceUrl: (ip: string, path?: string) => string;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Group tag first, then name. */
export const sortForDisplay = (pods: readonly PodStatusRecord[]): PodStatusRecord[] =>
  [...pods].sort((a, b) => {
    if (a.replicaSetId !== b.replicaSetId) {
      return a.replicaSetId < b.replicaSetId ? -1 : 1;
    }
    if (a.name === b.name) return 0;
    return a.name < b.name ? -1 : 1;
  });

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}

const PROBES: Array<{ type: ProbeType; label: string; key: 'started' | 'live' | 'ready' }> = [
  { type: 'startup', label: 'Started', key: 'started' },
  { type: 'liveness', label: 'Live', key: 'live' },
  { type: 'readiness', label: 'Ready', key: 'ready' },
];

const cardClass = (pod: PodStatusRecord): string => {
  if (pod.error) return 'pod-card error';
  if (!pod.info?.probeStatus.ready) return 'pod-card not-ready';
  return 'pod-card';
};

const infoRow = (label: string, value: string): string =>
  `<div class="info-row"><span class="info-label">${label}</span><span class="info-value">${value}</span></div>`;

function renderProbes(pod: PodStatusRecord, view: DashboardView): string {
  if (!pod.info) return '';
  const { probeStatus } = pod.info;

  const indicators = PROBES.map(({ type, label, key }) => {
    const active = probeStatus[key];
    const target = view.instanceUrl(pod.ip, `/api/probes/${type}/${active ? 'fail' : 'recover'}`);
    return [
      `<button type="button" class="probe-indicator" data-target="${escapeHtml(target)}" title="Click to toggle ${type} probe">`,
      `<span class="probe-dot${active ? ' active' : ''}"></span><span>${label}</span>`,
      '</button>',
    ].join('');
  });

  return `<div class="probe-status">${indicators.join('')}</div>`;
}

function renderPod(pod: PodStatusRecord, view: DashboardView): string {
  const rows = [
    infoRow('Status', escapeHtml(pod.phase)),
    infoRow(
      'Pod IP',
      pod.ip ? `<a href="${escapeHtml(view.instanceUrl(pod.ip))}">${escapeHtml(pod.ip)}</a>` : '&mdash;',
    ),
    infoRow('Node', escapeHtml(pod.node) || '&mdash;'),
  ];

  if (pod.info) {
    rows.push(
      infoRow('Container Age', formatDuration(pod.info.containerAge / 1_000_000)),
      infoRow('Start Time', `<time class="local-time" datetime="${escapeHtml(pod.info.startTime)}">${escapeHtml(pod.info.startTime)}</time>`),
      infoRow('Startup Delay', `${pod.info.startupDelay}s`),
    );
  }

  const lastCheck = pod.lastCheck.toISOString();

  return [
    `<div class="${cardClass(pod)}">`,
    `<div class="pod-name">${escapeHtml(pod.name)}</div>`,
    `<div class="replica-set-id">ReplicaSet: ${escapeHtml(pod.replicaSetId)}</div>`,
    `<div class="info-grid">${rows.join('')}</div>`,
    renderProbes(pod, view),
    pod.error ? `<div class="error-message">${escapeHtml(pod.error)}</div>` : '',
    `<div class="last-check">Last check: <time class="local-clock" datetime="${lastCheck}">${lastCheck.slice(11, 19)}</time></div>`,
    '</div>',
  ].join('');
}

const STYLES = /* css */ `
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; background: #0a0a0a; color: #e0e0e0; line-height: 1.6; }
  .container { max-width: 1400px; margin: 0 auto; padding: 20px; }
  h1 { text-align: center; color: #fff; margin-bottom: 20px; font-size: 2.5em; }
  .version-info { text-align: center; margin-bottom: 20px; }
  .version-info span { margin: 0 15px; }
  .controls { text-align: center; margin-bottom: 30px; }
  .refresh-control { display: inline-flex; align-items: center; gap: 20px; color: #00ff88; }
  .grid { display: grid; grid-template-columns: repeat(auto-fill, minmax(400px, 1fr)); gap: 20px; }
  .pod-card { background: linear-gradient(135deg, #1a1a2e 0%, #16213e 100%); border-radius: 15px; padding: 25px; border-top: 4px solid #00ff88; }
  .pod-card.error { border-top-color: #ff4444; }
  .pod-card.not-ready { border-top-color: #ff9800; }
  .pod-name { font-size: 1.4em; font-weight: bold; color: #00d4ff; word-break: break-all; }
  .replica-set-id { font-size: 0.8em; color: #888; margin-bottom: 15px; }
  .info-row { display: flex; justify-content: space-between; padding: 4px 0; border-bottom: 1px solid rgba(255, 255, 255, 0.05); }
  .info-label { color: #888; }
  .info-value a { color: #00d4ff; text-decoration: none; border-bottom: 1px dotted #00d4ff; }
  .probe-status { display: flex; justify-content: space-around; margin-top: 20px; }
  .probe-indicator { display: flex; align-items: center; gap: 8px; background: none; border: 0; color: inherit; cursor: pointer; font: inherit; }
  .probe-dot { width: 14px; height: 14px; border-radius: 50%; background: #ff4444; }
  .probe-dot.active { background: #00ff88; }
  .error-message { margin-top: 15px; padding: 10px; border-radius: 8px; background: rgba(255, 68, 68, 0.1); color: #ff6666; word-break: break-word; }
  .last-check { margin-top: 15px; font-size: 0.8em; color: #666; text-align: right; }
  .no-pods { text-align: center; color: #666; font-size: 1.2em; margin-top: 100px; }
`;

const SCRIPT = /* js */ `
  (function () {
    var slider = document.getElementById('refresh-slider');
    var label = document.getElementById('refresh-value');
    var timer;

    function setRefresh(seconds) {
      label.textContent = seconds + 's';
      if (timer) clearInterval(timer);
      timer = setInterval(function () { location.reload(); }, seconds * 1000);
      localStorage.setItem('refreshInterval', String(seconds));
    }

    slider.addEventListener('change', function () { setRefresh(Number(slider.value)); });
    var saved = Number(localStorage.getItem('refreshInterval')) || 1;
    slider.value = String(saved);
    setRefresh(saved);

    document.querySelectorAll('time.local-time').forEach(function (el) {
      el.textContent = new Date(el.getAttribute('datetime')).toLocaleString();
    });
    document.querySelectorAll('time.local-clock').forEach(function (el) {
      el.textContent = new Date(el.getAttribute('datetime')).toLocaleTimeString();
    });

    document.addEventListener('click', function (event) {
      var button = event.target.closest('.probe-indicator');
      if (!button) return;
      fetch('/api/proxy', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ url: button.dataset.target, method: 'POST' })
      }).then(function (response) {
        if (response.ok) {
          setTimeout(function () { location.reload(); }, 500);
        } else {
          response.text().then(function (text) { console.error('Failed to toggle probe:', text); });
        }
      }).catch(function (error) { console.error('Error toggling probe:', error); });
    });
  })();
`;

export function renderDashboard(pods: readonly PodStatusRecord[], view: DashboardView): string {
  const sorted = sortForDisplay(pods);
  const body =
    sorted.length > 0
      ? `<div class="grid">${sorted.map((pod) => renderPod(pod, view)).join('')}</div>`
      : `<div class="no-pods">No pods found with label ${escapeHtml(view.labelSelector)}</div>`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>Pod Monitor Dashboard</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="container">
    <h1>Pod Monitor Dashboard</h1>
    <div class="version-info">
      <span>Version: ${escapeHtml(view.build.version)}</span>
      <span>Commit: ${escapeHtml(view.build.commit)}</span>
      <span>Built: ${escapeHtml(view.build.buildTime)}</span>
    </div>
    <div class="controls">
      <div class="refresh-control">
        <label for="refresh-slider">Refresh Interval:</label>
        <input type="range" id="refresh-slider" min="1" max="10" value="1" />
        <span id="refresh-value">1s</span>
      </div>
    </div>
    ${body}
  </div>
  <script>${SCRIPT}</script>
</body>
</html>
`;
}
