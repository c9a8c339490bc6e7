import { FastifyInstance } from 'fastify';
import { ArbiterService } from '../../services/arbiter';
import { JobStatus } from '../../types/job';
import { buildServer } from '../../web/app';
import {
  FakeChainClient,
  FakeInferenceClient,
  JOB_REF,
  createLogger,
  jobTuple,
  testConfig } from '../$setup/fakes';

const DISPUTE = 'The buyer paid and the seller never shipped it'.padEnd(50, '.');

describe('HTTP routes', () => {
  let arbiter: ArbiterService;
  let server: FastifyInstance;

  beforeEach(async () => {
    const chain = new FakeChainClient();
    chain.jobs.set(JOB_REF, jobTuple());
    arbiter = await ArbiterService.init(testConfig(), {
      logger: createLogger(),
      inference: new FakeInferenceClient('75'),
      chain,
      signer: null,
    });
    server = buildServer(arbiter);
    await server.ready();
  });

  afterEach(async () => {
    await server.close();
    await arbiter.shutdown();
  });

  it('GET / should describe the service', async () => {
    const response = await server.inject({ method: 'GET', url: '/' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(arbiter.info());
  });

  it('POST /verify should accept a dispute and GET /verify/:job_id should report it', async () => {
    const response = await server.inject({ method: 'POST', url: '/verify', payload: { job_data: DISPUTE } });
    expect(response.statusCode).toBe(200);
    const receipt = response.json();
    expect(receipt.status).toBe(JobStatus.PROCESSING);
    expect(receipt.provider).toBe('fake');

    await arbiter.task.drain();
    const status = await server.inject({ method: 'GET', url: receipt.status_url });
    expect(status.statusCode).toBe(200);
    expect(status.json()).toMatchObject({
      job_id: receipt.job_id,
      status: JobStatus.COMPLETED,
      result: { verdict: '75', word_count: 9, reading_time: 1 },
    });
  });

  it('POST /verify should answer 400 for short text', async () => {
    const response = await server.inject({ method: 'POST', url: '/verify', payload: { job_data: 'too short' } });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'VALIDATION_ERROR',
      detail: 'Job data too short. Minimum length is 50 characters.',
    });
  });

  it('POST /verify should accept text at exactly the maximum length', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/verify',
      payload: { job_data: 'x'.repeat(400_000) },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe(JobStatus.PROCESSING);
  });

  it('POST /verify should answer 400 for 25 emoji', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/verify',
      payload: { job_data: '\u{1F600}'.repeat(25) },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'VALIDATION_ERROR',
      detail: 'Job data too short. Minimum length is 50 characters.',
    });
  });

  it('POST /verify should answer 400 when job_data is missing', async () => {
    const response = await server.inject({ method: 'POST', url: '/verify', payload: {} });
    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe('VALIDATION_ERROR');
    expect(response.json().detail).toContain('job_data');
  });

  it('POST /verify should answer 400 for a malformed body', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/verify',
      headers: { 'content-type': 'application/json' },
      payload: '{"job_data":',
    });
    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe('VALIDATION_ERROR');
  });

  it('GET /verify/:job_id should answer 404 for an unknown id', async () => {
    const response = await server.inject({ method: 'GET', url: '/verify/unknown' });
    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'JOB_NOT_FOUND', detail: 'Job not found' });
  });

  it('POST /validate should accept a cross-validation request', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/validate',
      payload: { job_id: 'abc', verifier_agent_id: 4 },
    });
    expect(response.statusCode).toBe(200);
    const receipt = response.json();
    expect(receipt.status_url).toBe(`/verify/${receipt.validation_id}`);

    await arbiter.task.drain();
    const status = await server.inject({ method: 'GET', url: receipt.status_url });
    expect(status.json()).toMatchObject({
      status: JobStatus.COMPLETED,
      result: { job_id: JOB_REF, verifier_agent_id: '4', ai_score: 75 },
    });
  });

  it('POST /validate should answer 400 for a malformed job id', async () => {
    const response = await server.inject({ method: 'POST', url: '/validate', payload: { job_id: 'xyz' } });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'VALIDATION_ERROR',
      detail: 'job_id must be a hex string of at most 32 bytes',
    });
  });

  it('should answer 500 without leaking unexpected errors', async () => {
    jest.spyOn(arbiter, 'getStatus').mockRejectedValue(new Error('disk on fire'));
    const response = await server.inject({ method: 'GET', url: '/verify/anything' });
    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'INTERNAL_ERROR', detail: 'Internal server error' });
  });
});

describe('HTTP routes without a chain', () => {
  it('POST /validate should answer 503', async () => {
    const arbiter = await ArbiterService.init(testConfig({ chain: undefined }), {
      logger: createLogger(),
      inference: new FakeInferenceClient(),
      signer: null,
    });
    const server = buildServer(arbiter);
    const response = await server.inject({ method: 'POST', url: '/validate', payload: { job_id: 'abc' } });
    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({ error: 'CONFIGURATION_ERROR', detail: 'cross-validation is not configured' });
    await server.close();
    await arbiter.shutdown();
  });
});
