import { FastifyInstance } from 'fastify';
import { ArbiterService } from '../../services/arbiter';
import { Params, ValidateBody, VerifyBody } from '../../types/http';

const verifySchema = {
  body: {
    type: 'object',
    required: ['job_data'],
    properties: {
      job_data: { type: 'string' },
    },
  },
};

const validateSchema = {
  body: {
    type: 'object',
    required: ['job_id'],
    properties: {
      job_id: { type: 'string' },
      transaction_id: { type: 'string' },
      verifier_agent_id: { type: ['integer', 'string'] },
    },
  },
};

export const registerAppRoutes = (server: FastifyInstance, arbiter: ArbiterService) => {

  server.get('/', async () => {
    return arbiter.info();
  });

  server.post<{ Body: VerifyBody }>('/verify', { schema: verifySchema }, async (request) => {
    return await arbiter.verify(request.body.job_data);
  });

  server.get<{ Params: Params }>('/verify/:job_id', async (request) => {
    return await arbiter.getStatus(request.params.job_id);
  });

  server.post<{ Body: ValidateBody }>('/validate', { schema: validateSchema }, async (request) => {
    return await arbiter.validate(request.body);
  });
};
