import Fastify, { type FastifyError } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import type { Logger } from 'pino';
import { ulid } from 'ulid';
import { AppError, replyWithAppError, toReplyArgs } from './errors.js';
import { parseBody, parseParams, parseQuery } from './middleware/validation.js';
import {
  CreateJobSchema,
  JobDetailsQuerySchema,
  JobParamsSchema,
  JobQuerySchema,
} from './schemas/job.js';
import type { DocumentPipelineService } from './service.js';

export interface ServerOptions {
  service: DocumentPipelineService;
  logger: Logger;
  corsDev?: boolean;
}

export async function createServer(options: ServerOptions) {
  const { service } = options;

  const app = Fastify({
    logger: options.logger,
    genReqId: () => ulid(),
  });

  // Security
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  // CORS (dev-friendly)
  if (options.corsDev) {
    await app.register(cors, {
      origin: ['http://localhost:3000', 'http://localhost:5173'],
      credentials: true,
    });
  }

  // Echo X-Request-ID
  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      if (error.type === 'INTERNAL') request.log.error({ err: error }, 'request failed');
      return replyWithAppError(reply, toReplyArgs(error));
    }
    // Fastify's own 4xx errors: malformed JSON, unsupported media type, oversized body
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return replyWithAppError(reply, { type: 'BAD_INPUT', statusCode: error.statusCode, message: error.message });
    }
    request.log.error({ err: error }, 'unhandled error');
    return replyWithAppError(reply, { type: 'INTERNAL' });
  });

  app.get('/health', async () => {
    const stats = await service.stats();
    return {
      ok: true,
      ...stats,
    };
  });

  // POST /jobs - Create a job; it stays pending until started
  app.post('/jobs', async (request, reply) => {
    const body = parseBody(CreateJobSchema, request.body);
    const jobId = await service.submit(body.input, body.config);
    reply.code(201).send({ jobId });
  });

  // POST /jobs/run - Create and run a job, answering with the terminal record
  app.post('/jobs/run', async (request) => {
    const body = parseBody(CreateJobSchema, request.body);
    return service.runSynchronously(body.input, body.config);
  });

  // GET /jobs - List jobs, newest first
  app.get('/jobs', async (request) => {
    const query = parseQuery(JobQuerySchema, request.query);
    const jobs = await service.listJobs({ status: query.status, limit: query.limit });
    return { jobs };
  });

  // GET /jobs/:jobId - Get job details
  app.get('/jobs/:jobId', async (request, reply) => {
    const { jobId } = parseParams(JobParamsSchema, request.params);
    const { includePartialResults } = parseQuery(JobDetailsQuerySchema, request.query);

    const job = await service.status(jobId, { includePartialResults: includePartialResults === '1' });
    if (!job) {
      return replyWithAppError(reply, { type: 'NOT_FOUND', key: 'JOB_NOT_FOUND' });
    }
    return job;
  });

  // POST /jobs/:jobId/start - Queue a pending job
  app.post('/jobs/:jobId/start', async (request, reply) => {
    const { jobId } = parseParams(JobParamsSchema, request.params);
    const result = await service.start(jobId);

    if (result.status === 'accepted') {
      reply.code(202).send({ jobId, status: result.job.status });
      return;
    }
    switch (result.reason) {
      case 'notFound':
        return replyWithAppError(reply, { type: 'NOT_FOUND', key: 'JOB_NOT_FOUND' });
      case 'alreadyRunning':
        return replyWithAppError(reply, { type: 'ALREADY_RUNNING', key: 'JOB_ALREADY_RUNNING' });
      case 'notStartable':
        return replyWithAppError(reply, { type: 'CONFLICT', key: 'JOB_NOT_STARTABLE' });
    }
  });

  // POST /jobs/:jobId/cancel - Cancel a pending or running job
  app.post('/jobs/:jobId/cancel', async (request, reply) => {
    const { jobId } = parseParams(JobParamsSchema, request.params);
    const result = await service.cancelJob(jobId);

    switch (result.status) {
      case 'cancelled':
        reply.code(202).send({ jobId, status: result.job.status });
        return;
      case 'notFound':
        return replyWithAppError(reply, { type: 'NOT_FOUND', key: 'JOB_NOT_FOUND' });
      case 'rejected':
        return replyWithAppError(reply, { type: 'CONFLICT', key: 'JOB_ALREADY_FINISHED' });
    }
  });

  // DELETE /jobs/:jobId - Remove a job that is not running
  app.delete('/jobs/:jobId', async (request, reply) => {
    const { jobId } = parseParams(JobParamsSchema, request.params);
    const result = await service.deleteJob(jobId);

    switch (result.status) {
      case 'deleted':
        reply.code(204).send();
        return;
      case 'notFound':
        return replyWithAppError(reply, { type: 'NOT_FOUND', key: 'JOB_NOT_FOUND' });
      case 'conflict':
        return replyWithAppError(reply, { type: 'CONFLICT', key: 'JOB_RUNNING_DELETE' });
    }
  });

  // Add cleanup on server close
  app.addHook('onClose', async () => {
    await service.shutdown();
  });

  return app;
}
