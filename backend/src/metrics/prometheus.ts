import type { FetchErrorReason, ValidationFailureKind } from '../types/auth.js';

type LabelKey = string;

function labelsKey(labels: Record<string, string | number | undefined>): LabelKey {
  const entries = Object.entries(labels)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${String(v)}`)
    .sort();
  return entries.join(',');
}

function renderLabels(key: LabelKey): string {
  if (!key) {
    return '';
  }
  return key
    .split(',')
    .map((pair) => {
      const index = pair.indexOf('=');
      const name = pair.slice(0, index);
      const value = pair.slice(index + 1);
      return `${name}="${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
    })
    .join(',');
}

const requestCounter = new Map<LabelKey, number>();

const durationBuckets = [5, 10, 25, 50, 100, 250, 500, 1000, 2500];
type Hist = { count: number; sum: number; buckets: number[] };
const requestHistogram = new Map<LabelKey, Hist>();

// Auth domain metrics
const tokenValidationCounter = new Map<LabelKey, number>();
const keySetFetchCounter = new Map<LabelKey, number>();

export type TokenValidationOutcome = 'success' | 'missing_token' | 'invalid_header' | ValidationFailureKind;
export type KeySetFetchOutcome = 'ok' | FetchErrorReason;

export function recordHttpRequest(labels: { method: string; route: string; status: number }, durationMs: number) {
  const key = labelsKey({ method: labels.method, route: labels.route, status: labels.status });
  requestCounter.set(key, (requestCounter.get(key) ?? 0) + 1);

  const hKey = labelsKey({ method: labels.method, route: labels.route });
  const hist = requestHistogram.get(hKey) ?? { count: 0, sum: 0, buckets: Array<number>(durationBuckets.length).fill(0) };
  hist.count += 1;
  hist.sum += durationMs;
  // one bucket per observation; render() accumulates
  const bucketIndex = durationBuckets.findIndex((le) => durationMs <= le);
  if (bucketIndex >= 0) {
    hist.buckets[bucketIndex] += 1;
  }
  requestHistogram.set(hKey, hist);
}

export function recordTokenValidation(labels: { outcome: TokenValidationOutcome }) {
  const key = labelsKey({ outcome: labels.outcome });
  tokenValidationCounter.set(key, (tokenValidationCounter.get(key) ?? 0) + 1);
}

export function recordKeySetFetch(labels: { outcome: KeySetFetchOutcome }) {
  const key = labelsKey({ outcome: labels.outcome });
  keySetFetchCounter.set(key, (keySetFetchCounter.get(key) ?? 0) + 1);
}

export function resetMetrics(): void {
  requestCounter.clear();
  requestHistogram.clear();
  tokenValidationCounter.clear();
  keySetFetchCounter.clear();
}

function renderCounter(lines: string[], name: string, help: string, counter: Map<LabelKey, number>) {
  lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} counter`);
  for (const [key, value] of counter.entries()) {
    lines.push(`${name}{${renderLabels(key)}} ${value}`);
  }
}

export function renderPrometheus(): string {
  const lines: string[] = [];
  renderCounter(lines, 'http_requests_total', 'Total number of HTTP requests', requestCounter);
  renderCounter(lines, 'token_validations_total', 'Bearer token validations by outcome', tokenValidationCounter);
  renderCounter(lines, 'jwks_fetches_total', 'Outbound key set fetches by outcome', keySetFetchCounter);

  lines.push('# HELP http_request_duration_ms HTTP request duration in ms');
  lines.push('# TYPE http_request_duration_ms histogram');
  for (const [key, hist] of requestHistogram.entries()) {
    const baseLbl = renderLabels(key);
    let cumulative = 0;
    for (let i = 0; i < durationBuckets.length; i++) {
      cumulative += hist.buckets[i] ?? 0;
      lines.push(`http_request_duration_ms_bucket{${baseLbl},le="${durationBuckets[i]}"} ${cumulative}`);
    }
    // +Inf bucket
    lines.push(`http_request_duration_ms_bucket{${baseLbl},le="+Inf"} ${hist.count}`);
    lines.push(`http_request_duration_ms_count{${baseLbl}} ${hist.count}`);
    lines.push(`http_request_duration_ms_sum{${baseLbl}} ${hist.sum}`);
  }

  return lines.join('\n') + '\n';
}
