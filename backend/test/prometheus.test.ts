import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import {
  recordHttpRequest,
  recordKeySetFetch,
  recordTokenValidation,
  renderPrometheus,
  resetMetrics,
} from '../src/metrics/prometheus.js';

beforeEach(() => {
  resetMetrics();
});

test('renders auth counters by outcome', () => {
  recordTokenValidation({ outcome: 'success' });
  recordTokenValidation({ outcome: 'success' });
  recordTokenValidation({ outcome: 'Expired' });
  recordKeySetFetch({ outcome: 'timeout' });

  const lines = renderPrometheus().split('\n');

  assert.ok(lines.includes('token_validations_total{outcome="success"} 2'));
  assert.ok(lines.includes('token_validations_total{outcome="Expired"} 1'));
  assert.ok(lines.includes('jwks_fetches_total{outcome="timeout"} 1'));
});

test('histogram buckets are cumulative and each request is counted once', () => {
  recordHttpRequest({ method: 'GET', route: '/api/protected', status: 200 }, 7);
  recordHttpRequest({ method: 'GET', route: '/api/protected', status: 401 }, 30);
  recordHttpRequest({ method: 'GET', route: '/api/protected', status: 200 }, 9000);

  const lines = renderPrometheus().split('\n');
  const labels = 'method="GET",route="/api/protected"';

  assert.ok(lines.includes(`http_request_duration_ms_bucket{${labels},le="5"} 0`));
  assert.ok(lines.includes(`http_request_duration_ms_bucket{${labels},le="10"} 1`));
  assert.ok(lines.includes(`http_request_duration_ms_bucket{${labels},le="50"} 2`));
  assert.ok(lines.includes(`http_request_duration_ms_bucket{${labels},le="2500"} 2`));
  assert.ok(lines.includes(`http_request_duration_ms_bucket{${labels},le="+Inf"} 3`));
  assert.ok(lines.includes(`http_request_duration_ms_sum{${labels}} 9037`));
  assert.ok(lines.includes('http_requests_total{method="GET",route="/api/protected",status="200"} 2'));
});
