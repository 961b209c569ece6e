// Dashboard HTML — self-contained single page served at GET /
// Inline CSS + Plotly CDN + WebSocket updates, HTTP fallback when the socket is down

export function getDashboardHtml(title: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(title)}</title>
<link rel="preconnect" href="https://fonts.googleapis.com">
<link rel="preconnect" href="https://fonts.gstatic.com" crossorigin>
<link href="https://fonts.googleapis.com/css2?family=IBM+Plex+Sans:wght@400;500;600&family=JetBrains+Mono:wght@400;500&display=swap" rel="stylesheet">
<script src="https://cdn.jsdelivr.net/npm/plotly.js-dist-min@2.35.2/plotly.min.js"></script>
<style>
  :root {
    --bg-root: #09090b;
    --bg-panel: #18181b;
    --border: #27272a;
    --border-light: #3f3f46;
    --text-primary: #f4f4f5;
    --text-secondary: #a1a1aa;
    --text-muted: #71717a;
    --accent: #22c55e;
    --danger: #ef4444;
    --font-sans: 'IBM Plex Sans', system-ui, sans-serif;
    --font-mono: 'JetBrains Mono', monospace;
  }

  * { margin: 0; padding: 0; box-sizing: border-box; }

  body {
    background: var(--bg-root);
    color: var(--text-primary);
    font-family: var(--font-sans);
    font-size: 14px;
    line-height: 1.5;
  }

  /* ── Header ─────────────────────────────────────── */
  .header {
    position: sticky;
    top: 0;
    z-index: 100;
    background: var(--bg-root);
    border-bottom: 1px solid var(--border);
    padding: 12px 24px;
    display: flex;
    align-items: center;
    gap: 24px;
  }

  .header-brand { font-weight: 600; font-size: 16px; }

  .live-dot {
    margin-left: auto;
    width: 8px;
    height: 8px;
    border-radius: 50%;
    background: var(--accent);
  }

  .live-dot.disconnected { background: var(--danger); }

  /* ── Tabs ───────────────────────────────────────── */
  .tab-bar {
    display: flex;
    gap: 4px;
    padding: 0 24px;
    border-bottom: 1px solid var(--border);
  }

  .tab-button {
    background: none;
    border: none;
    border-bottom: 2px solid transparent;
    color: var(--text-secondary);
    font: inherit;
    padding: 10px 14px;
    cursor: pointer;
  }

  .tab-button.active { color: var(--text-primary); border-bottom-color: var(--accent); }

  .container { max-width: 1200px; margin: 0 auto; padding: 20px 24px; }

  .tab-panel { display: none; }
  .tab-panel.active { display: block; }

  .tab-panel h1 { text-align: center; font-size: 22px; font-weight: 600; margin-bottom: 12px; }
  .tab-panel p { color: var(--text-secondary); margin-bottom: 16px; }

  /* ── Widgets ────────────────────────────────────── */
  .widget { margin-bottom: 16px; }
  .widget label { display: block; color: var(--text-secondary); font-size: 13px; margin-bottom: 6px; }

  .widget select {
    background: var(--bg-panel);
    color: var(--text-primary);
    border: 1px solid var(--border-light);
    border-radius: 4px;
    padding: 6px 8px;
    font: inherit;
    min-width: 240px;
  }

  .slider-row { display: flex; align-items: center; gap: 12px; }
  .slider-row input[type=range] { flex: 1; accent-color: var(--accent); }
  .slider-value { font-family: var(--font-mono); min-width: 48px; text-align: right; }
  .slider-marks { display: flex; justify-content: space-between; font-family: var(--font-mono); font-size: 11px; color: var(--text-muted); }

  .widget-error { color: var(--danger); font-size: 12px; margin-top: 4px; min-height: 16px; }

  /* ── Outputs ────────────────────────────────────── */
  .output {
    background: var(--bg-panel);
    border: 1px solid var(--border);
    border-radius: 6px;
    padding: 12px;
    min-height: 420px;
  }

  .output.table { min-height: 0; overflow-x: auto; }

  table.preview { width: 100%; border-collapse: collapse; font-family: var(--font-mono); font-size: 12px; }
  table.preview th, table.preview td { border: 1px solid var(--border-light); padding: 4px 8px; text-align: left; }
  table.preview th { color: var(--text-secondary); font-weight: 500; }

  .empty-state { color: var(--text-muted); text-align: center; padding: 160px 0; }
</style>
</head>
<body>
<div class="header">
  <div class="header-brand">${escapeHtml(title)}</div>
  <div class="live-dot disconnected" id="live-dot" title="Connecting..."></div>
</div>
<div class="tab-bar" id="tab-bar"></div>
<div class="container" id="tabs"></div>

<script>
(function() {
  'use strict';

  const PLASMA = [
    [0.0, '#0d0887'], [0.111, '#46039f'], [0.222, '#7201a8'], [0.333, '#9c179e'], [0.444, '#bd3786'],
    [0.556, '#d8576b'], [0.667, '#ed7953'], [0.778, '#fb9f3a'], [0.889, '#fdca26'], [1.0, '#f0f921']
  ];
  const COLOR_SCALES = { Plasma: PLASMA };
  const CONTINENT_COLORS = ['#636efa', '#ef553b', '#00cc96', '#ab63fa', '#ffa15a', '#19d3f3', '#ff6692'];
  const MAX_RECONNECT = 15000;

  const $liveDot = document.getElementById('live-dot');
  const $tabBar = document.getElementById('tab-bar');
  const $tabs = document.getElementById('tabs');

  let ws = null;
  let layout = null;
  let fallbackLayout = null;
  let bindings = [];
  let values = {};
  let reconnectDelay = 1000;

  function esc(s) { return String(s).replace(/&/g,'&amp;').replace(/</g,'&lt;').replace(/>/g,'&gt;').replace(/"/g,'&quot;').replace(/'/g,'&#39;'); }

  function fetchJSON(path) {
    return fetch(path).then(function(r) { return r.json(); });
  }

  // ── Layout ───────────────────────────────────────
  function buildLayout(l) {
    layout = l;
    $tabBar.innerHTML = '';
    $tabs.innerHTML = '';
    l.tabs.forEach(function(tab, i) {
      const btn = document.createElement('button');
      btn.className = 'tab-button' + (i === 0 ? ' active' : '');
      btn.textContent = tab.label;
      btn.onclick = function() { selectTab(tab.id); };
      btn.dataset.tab = tab.id;
      $tabBar.appendChild(btn);

      const panel = document.createElement('div');
      panel.className = 'tab-panel' + (i === 0 ? ' active' : '');
      panel.id = 'tab-' + tab.id;
      let html = '<h1>' + esc(tab.heading) + '</h1>';
      if (tab.description) html += '<p>' + esc(tab.description) + '</p>';
      panel.innerHTML = html;
      tab.widgets.forEach(function(w) { panel.appendChild(buildWidget(w)); });
      tab.outputs.forEach(function(o) {
        const out = document.createElement('div');
        out.className = 'output ' + o.kind;
        out.id = 'out-' + o.id;
        panel.appendChild(out);
      });
      $tabs.appendChild(panel);
    });
  }

  function selectTab(id) {
    Array.prototype.forEach.call(document.querySelectorAll('.tab-button'), function(b) {
      b.classList.toggle('active', b.dataset.tab === id);
    });
    Array.prototype.forEach.call(document.querySelectorAll('.tab-panel'), function(p) {
      p.classList.toggle('active', p.id === 'tab-' + id);
    });
    // Plotly sizes hidden plots at zero width
    Array.prototype.forEach.call(document.querySelectorAll('#tab-' + id + ' .js-plotly-plot'), function(el) {
      Plotly.Plots.resize(el);
    });
  }

  function buildWidget(w) {
    const wrap = document.createElement('div');
    wrap.className = 'widget';
    let html = '<label for="in-' + esc(w.id) + '">' + esc(w.label) + '</label>';
    if (w.kind === 'slider') {
      html += '<div class="slider-row"><input type="range" id="in-' + esc(w.id) + '" min="' + w.min + '" max="' + w.max
        + '" step="' + w.step + '" value="' + w.defaultValue + '"><span class="slider-value" id="val-' + esc(w.id) + '">'
        + w.defaultValue + '</span></div>';
      html += '<div class="slider-marks">' + w.marks.map(function(m) { return '<span>' + esc(m.label) + '</span>'; }).join('') + '</div>';
    } else {
      html += '<select id="in-' + esc(w.id) + '">' + w.options.map(function(o) {
        return '<option value="' + esc(o.value) + '"' + (o.value === w.defaultValue ? ' selected' : '') + '>' + esc(o.label) + '</option>';
      }).join('') + '</select>';
    }
    html += '<div class="widget-error" id="err-' + esc(w.id) + '"></div>';
    wrap.innerHTML = html;

    const input = wrap.querySelector('#in-' + CSS.escape(w.id));
    values[w.id] = w.defaultValue;
    if (w.kind === 'slider') {
      input.addEventListener('input', function() {
        document.getElementById('val-' + w.id).textContent = input.value;
      });
    }
    input.addEventListener('change', function() {
      const value = w.kind === 'slider' ? Number(input.value) : input.value;
      sendInput(w.id, value);
    });
    return wrap;
  }

  function syncWidgets(state) {
    if (!layout || !state) return;
    layout.tabs.forEach(function(tab) {
      tab.widgets.forEach(function(w) {
        const v = state[w.stateKey];
        if (v === undefined) return;
        values[w.id] = v;
        const input = document.getElementById('in-' + w.id);
        if (input) input.value = String(v);
        const label = document.getElementById('val-' + w.id);
        if (label) label.textContent = String(v);
      });
    });
  }

  // ── Rendering ────────────────────────────────────
  const baseLayout = {
    paper_bgcolor: '#18181b',
    plot_bgcolor: '#18181b',
    font: { color: '#f4f4f5', family: "'IBM Plex Sans', sans-serif" },
    margin: { t: 56, r: 24, b: 48, l: 64 },
  };

  function plot(el, traces, extra) {
    Plotly.react(el, traces, Object.assign({}, baseLayout, extra), { responsive: true, displaylogo: false });
  }

  function renderTable(el, spec) {
    el.innerHTML = '<table class="preview"><thead><tr>'
      + spec.columns.map(function(c) { return '<th>' + esc(c) + '</th>'; }).join('')
      + '</tr></thead><tbody>'
      + spec.rows.map(function(row) {
          return '<tr>' + row.map(function(cell) { return '<td>' + esc(cell) + '</td>'; }).join('') + '</tr>';
        }).join('')
      + '</tbody></table>';
  }

  function renderScatter(el, spec) {
    const groups = {};
    const order = [];
    let maxSize = 0;
    spec.points.forEach(function(p) {
      if (!groups[p.color]) { groups[p.color] = []; order.push(p.color); }
      groups[p.color].push(p);
      if (p.size > maxSize) maxSize = p.size;
    });
    const sizeref = maxSize > 0 ? 2 * maxSize / (40 * 40) : 1;
    const traces = order.map(function(name, i) {
      const pts = groups[name];
      return {
        type: 'scatter',
        mode: 'markers',
        name: name,
        x: pts.map(function(p) { return p.x; }),
        y: pts.map(function(p) { return p.y; }),
        hovertext: pts.map(function(p) { return p.label; }),
        marker: {
          size: pts.map(function(p) { return p.size; }),
          sizemode: 'area',
          sizeref: sizeref,
          sizemin: 2,
          color: CONTINENT_COLORS[i % CONTINENT_COLORS.length],
        },
      };
    });
    plot(el, traces, {
      title: { text: spec.title },
      xaxis: { title: { text: spec.encoding.x } },
      yaxis: { title: { text: spec.encoding.y } },
      legend: { title: { text: spec.encoding.color } },
    });
  }

  function renderLine(el, spec) {
    plot(el, [{
      type: 'scatter',
      mode: spec.markers ? 'lines+markers' : 'lines',
      x: spec.points.map(function(p) { return p.x; }),
      y: spec.points.map(function(p) { return p.y; }),
      line: { color: '#636efa' },
    }], {
      title: { text: spec.title },
      xaxis: { title: { text: spec.encoding.x } },
      yaxis: { title: { text: spec.encoding.y } },
    });
  }

  function renderChoropleth(el, spec) {
    plot(el, [{
      type: 'choropleth',
      locationmode: spec.locationMode,
      locations: spec.locations,
      z: spec.values,
      hovertext: spec.hover,
      colorscale: COLOR_SCALES[spec.colorScale] || spec.colorScale,
      colorbar: { title: { text: spec.variable } },
    }], {
      title: { text: spec.title },
      geo: { bgcolor: '#18181b', showframe: false },
    });
  }

  function renderHeatmap(el, spec) {
    const text = spec.matrix.map(function(row) {
      return row.map(function(v) { return v === null ? 'NaN' : v.toFixed(3); });
    });
    plot(el, [{
      type: 'heatmap',
      x: spec.labels,
      y: spec.labels,
      z: spec.matrix,
      text: spec.annotate ? text : undefined,
      texttemplate: spec.annotate ? '%{text}' : undefined,
      zmin: -1,
      zmax: 1,
      colorbar: { title: { text: spec.colorLabel } },
    }], {
      title: { text: spec.title },
      yaxis: { autorange: 'reversed' },
    });
  }

  function renderOutput(id, spec) {
    const el = document.getElementById('out-' + id);
    if (!el || !spec) return;
    switch (spec.kind) {
      case 'table': renderTable(el, spec); break;
      case 'scatter': renderScatter(el, spec); break;
      case 'line': renderLine(el, spec); break;
      case 'choropleth': renderChoropleth(el, spec); break;
      case 'heatmap': renderHeatmap(el, spec); break;
      default:
        Plotly.purge(el);
        el.innerHTML = '<div class="empty-state">' + esc(spec.title) + ': ' + esc(spec.message || 'no data') + '</div>';
    }
  }

  function renderOutputs(outputs) {
    Object.keys(outputs || {}).forEach(function(id) { renderOutput(id, outputs[id]); });
  }

  // ── Updates ──────────────────────────────────────
  function showInputError(id, message) {
    const el = document.getElementById('err-' + id);
    if (el) el.textContent = message || '';
  }

  function sendInput(id, value) {
    showInputError(id, '');
    if (ws && ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify({ type: 'input', id: id, value: value }));
      return;
    }
    // Stateless fallback: every output bound to this input, rendered from all current values
    values[id] = value;
    bindings.filter(function(b) { return b.inputs.indexOf(id) >= 0; }).forEach(function(b) {
      renderOverHttp(b.output, id);
    });
  }

  function renderOverHttp(output, inputId) {
    const query = Object.keys(values).map(function(k) {
      return encodeURIComponent(k) + '=' + encodeURIComponent(values[k]);
    }).join('&');
    fetchJSON('/outputs/' + encodeURIComponent(output) + '?' + query).then(function(data) {
      if (data.spec) {
        renderOutput(output, data.spec);
        syncWidgets(data.state);
      } else if (inputId) {
        showInputError(inputId, data.message || data.error);
      }
    }).catch(function() {});
  }

  function startHttpFallback() {
    if (layout || !fallbackLayout) return;
    buildLayout(fallbackLayout);
    bindings.forEach(function(b) { renderOverHttp(b.output); });
  }

  function connectWS() {
    const proto = location.protocol === 'https:' ? 'wss:' : 'ws:';
    ws = new WebSocket(proto + '//' + location.host);

    ws.onopen = function() {
      reconnectDelay = 1000;
      $liveDot.classList.remove('disconnected');
      $liveDot.title = 'WebSocket connected';
    };

    ws.onclose = function() {
      $liveDot.classList.add('disconnected');
      $liveDot.title = 'WebSocket disconnected — reconnecting...';
      startHttpFallback();
      setTimeout(connectWS, reconnectDelay);
      reconnectDelay = Math.min(reconnectDelay * 1.5, MAX_RECONNECT);
    };

    ws.onerror = function() { ws.close(); };

    ws.onmessage = function(ev) {
      let msg;
      try { msg = JSON.parse(ev.data); } catch (e) { return; }

      switch (msg.type) {
        case 'init':
          buildLayout(msg.layout);
          syncWidgets(msg.state);
          renderOutputs(msg.outputs);
          break;
        case 'outputs':
          syncWidgets(msg.state);
          renderOutputs(msg.outputs);
          break;
        case 'input_error':
          showInputError(msg.id, msg.message);
          break;
      }
    };
  }

  // ── Init ─────────────────────────────────────────
  fetchJSON('/layout').then(function(data) {
    bindings = data.bindings || [];
    fallbackLayout = data;
    if (ws && ws.readyState === WebSocket.CLOSED) startHttpFallback();
  }).catch(function() {});
  connectWS();

})();
</script>
</body>
</html>`;
}

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
