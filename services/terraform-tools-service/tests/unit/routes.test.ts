import { afterEach, describe, expect, test, vi } from 'vitest';
import { parseConfig } from '../../src/config';
import { RunnerError } from '../../src/errors';
import { statusFor } from '../../src/routes';
import { createService } from '../../src/server';
import { BucketAccessScanner, FakeRunner, routeFetch } from '../helpers';

function app(runner = new FakeRunner()) {
  return createService(parseConfig({}), { runner, scanner: new BucketAccessScanner(), fetch: routeFetch({}) }).app;
}

function post(path: string, body: string) {
  return app().request(path, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body });
}

describe('statusFor', () => {
  const error = (code: string, details?: unknown) => ({ code, message: 'x', service: 's', timestamp: 't', details });

  test('should map error codes and kinds to HTTP statuses', () => {
    expect(statusFor(error('VALIDATION_ERROR'))).toBe(400);
    expect(statusFor(error('FETCH_ERROR', { kind: 'notFound' }))).toBe(404);
    expect(statusFor(error('FETCH_ERROR', { kind: 'tooLarge' }))).toBe(413);
    expect(statusFor(error('FETCH_ERROR', { kind: 'unsupportedFormat' }))).toBe(415);
    expect(statusFor(error('EXTRACT_ERROR', { kind: 'malformed' }))).toBe(422);
    expect(statusFor(error('CANCELLED'))).toBe(499);
    expect(statusFor(error('SCAN_ERROR', { kind: 'engineFailed' }))).toBe(502);
    expect(statusFor(error('RUNNER_ERROR', { kind: 'timeout' }))).toBe(504);
    expect(statusFor(error('REMEDIATION_ERROR', { kind: 'ioFailure' }))).toBe(500);
    expect(statusFor(error('INTERNAL_ERROR'))).toBe(500);
  });
});

describe('Terraform Tools Service Routes', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test('GET /health should return healthy status', async () => {
    const response = await app().request('/health');

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'healthy', service: 'terraform-tools-service', version: '0.1.0' });
  });

  test('GET /api/tools should list the tools', async () => {
    const response = await app().request('/api/tools');
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ success: true });
    expect(body).toHaveProperty('data.length', 10);
  });

  test('POST to an unknown tool should return 404', async () => {
    const response = await post('/api/tools/terraform_import', '{}');

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Unknown tool: terraform_import' },
    });
  });

  test('POST with a malformed body should return 400', async () => {
    const response = await post('/api/tools/terraform_run_checkov', '{"directory":');

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: { message: 'Request body must be valid JSON' } });
  });

  test('POST with invalid input should return 400', async () => {
    const response = await post('/api/tools/terraform_command', JSON.stringify({ command: 'import', directory: '/w' }));

    expect(response.status).toBe(400);
  });

  test('a missing module should return 404', async () => {
    const response = await post(
      '/api/tools/terraform_analyze_module',
      JSON.stringify({ module: 'https://files.test/missing.zip' })
    );

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({ error: { code: 'FETCH_ERROR', details: { kind: 'notFound' } } });
  });

  test('a missing terraform binary should return 502', async () => {
    const runner = new FakeRunner().enqueue(new RunnerError('notFound', 'Command not found: terraform'));

    const response = await app(runner).request('/api/tools/terraform_command', {
      method: 'POST',
      body: JSON.stringify({ command: 'init', directory: '/work' }),
    });

    expect(response.status).toBe(502);
  });

  test('a successful call should return the rendered output', async () => {
    const runner = new FakeRunner().enqueue({ stdout: 'Terraform has been successfully initialized!' });

    const response = await app(runner).request('/api/tools/terraform_command', {
      method: 'POST',
      body: JSON.stringify({ command: 'init', directory: '/work' }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      success: true,
      data: { command: 'init', result: { output: 'Terraform has been successfully initialized!' } },
      output: expect.stringMatching(/^## terraform init\n/),
    });
  });

  test('GET /api/resources/:name should serve markdown', async () => {
    const response = await app().request('/api/resources/gcp-best-practices');

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/markdown; charset=utf-8');
    expect((await response.text()).length).toBeGreaterThan(0);
    expect((await app().request('/api/resources/secrets')).status).toBe(404);
  });

  test('GET /api/resources/:name should render catalog resources', async () => {
    const response = await app().request('/api/resources/gcp-provider-resources');

    expect(response.status).toBe(200);
    expect((await response.text()).startsWith('# GCP Terraform Provider Resources\n\n## compute\n')).toBe(true);
  });

  test('API routes should require the service token when configured', async () => {
    vi.stubEnv('INTERNAL_SERVICE_TOKEN', 'test-secret');
    const service = app();

    expect((await service.request('/api/tools')).status).toBe(401);
    expect((await service.request('/api/tools', { headers: { 'x-internal-service-token': 'test-secret' } })).status).toBe(200);
    expect((await service.request('/api/tools', { headers: { Authorization: 'Bearer test-secret' } })).status).toBe(200);
    expect((await service.request('/health')).status).toBe(200);
  });

  test('unknown routes should return 404', async () => {
    const response = await app().request('/metrics');

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({ error: { message: 'No route for GET /metrics' } });
  });
});
