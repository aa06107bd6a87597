/**
 * HTTP surface: a thin JSON wrapper over askQuestion and the eval harness.
 * Logging goes through Fastify's pino logger.
 */

import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import {
  CfgSqlError,
  ExecutionError,
  GenerationServiceError,
  askQuestion,
  defaultEvalCases,
  errorMessage,
  runEvals,
  summarize,
  synthesize,
  type EvalCase,
  type EvalResult,
  type EvalSummary,
  type QueryEngine,
  type QueryGenerator,
  type Row,
  type SchemaSource,
} from '@cfgsql/core';

export interface ServerDeps {
  catalog: SchemaSource;
  generator: QueryGenerator;
  engine: QueryEngine;
}

export interface BuildServerOpts {
  /** Called per request; nothing about the schema is cached between requests */
  deps: () => ServerDeps;
  /** Cases served by /api/eval. Default: the built-in cases */
  cases?: () => EvalCase[];
  /** Reference time for /api/query. Default: now */
  now?: () => Date;
  logger?: boolean;
}

export interface QueryResponse {
  sql: string;
  data: Row[];
  rows: number;
}

export interface QueryErrorResponse {
  error: string;
  hint?: string;
  sql?: string;
}

export interface EvalResponse {
  results: EvalResult[];
  summary: EvalSummary;
  passed: boolean;
  error?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readQuery(body: unknown): string {
  if (!isRecord(body) || typeof body.query !== 'string') return '';
  return body.query.trim();
}

function sendFailure(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof ExecutionError) {
    const payload: QueryErrorResponse = { sql: err.sql, error: err.message };
    return reply.code(502).send(payload);
  }
  if (err instanceof GenerationServiceError) {
    const payload: QueryErrorResponse = { error: err.message };
    return reply.code(502).send(payload);
  }
  if (err instanceof CfgSqlError) {
    const payload: QueryErrorResponse = { error: err.message };
    return reply.code(500).send(payload);
  }
  throw err;
}

export function buildServer(opts: BuildServerOpts): FastifyInstance {
  const app = Fastify({ logger: opts.logger ?? false });
  const now = opts.now ?? (() => new Date());
  const cases = opts.cases ?? defaultEvalCases;

  app.addHook('onRequest', async (_req, reply) => {
    reply.header('Access-Control-Allow-Origin', '*');
    reply.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    reply.header('Access-Control-Allow-Headers', 'Content-Type');
  });

  app.setErrorHandler((err, req, reply) => {
    const status = err.statusCode && err.statusCode < 500 ? err.statusCode : 500;
    if (status >= 500) {
      req.log.error({ err }, 'request failed');
    }
    const payload: QueryErrorResponse = { error: err.message };
    reply.code(status).send(payload);
  });

  app.options('/api/*', async (_req, reply) => reply.code(204).send());

  app.post('/api/query', async (req, reply) => {
    const question = readQuery(req.body);
    if (!question) {
      const payload: QueryErrorResponse = { error: 'query is required' };
      return reply.code(400).send(payload);
    }

    const started = performance.now();
    try {
      const answer = await askQuestion(question, opts.deps(), { referenceTime: now() });
      if (answer.status === 'unsupported') {
        req.log.info({ question, reason: answer.reason }, 'question refused');
        const payload: QueryErrorResponse = { error: answer.reason, hint: answer.hint };
        return reply.code(422).send(payload);
      }

      req.log.info(
        {
          question,
          sql: answer.sql,
          rows: answer.result.rowCount,
          execMs: answer.result.execMs,
          totalMs: Math.round(performance.now() - started),
          warnings: answer.warnings,
        },
        'question answered',
      );
      const payload: QueryResponse = { sql: answer.sql, data: answer.result.rows, rows: answer.result.rowCount };
      return reply.send(payload);
    } catch (err: unknown) {
      req.log.warn({ question, error: errorMessage(err) }, 'question failed');
      return sendFailure(reply, err);
    }
  });

  app.route({
    method: ['GET', 'POST'],
    url: '/api/eval',
    handler: async (req, reply) => {
      try {
        const deps = opts.deps();
        const schema = await deps.catalog.fetchSchema();
        const grammar = synthesize(schema);
        const run = await runEvals(cases(), { generator: deps.generator, engine: deps.engine, grammar });
        const summary = summarize(run.results);
        req.log.info({ ...summary }, 'evals finished');

        const payload: EvalResponse = { results: run.results, summary, passed: run.error === null };
        if (run.error !== null) payload.error = run.error;
        return reply.send(payload);
      } catch (err: unknown) {
        return sendFailure(reply, err);
      }
    },
  });

  return app;
}
