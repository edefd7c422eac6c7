import { FastifyInstance } from 'fastify';

export type ReadinessCheck = () => Promise<{ ok: boolean; error?: string }>;

export type HealthRoutesOptions = {
  stage: string;
  checks: Record<string, ReadinessCheck>;
};

export default async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions) {
  fastify.get('/health', async () => {
    return { status: 'ok', stage: opts.stage };
  });

  fastify.get('/ready', async (request, reply) => {
    const names = Object.keys(opts.checks);
    const results = await Promise.all(names.map((name) => opts.checks[name]()));
    const checks: Record<string, { ok: boolean; error?: string }> = {};
    names.forEach((name, i) => {
      checks[name] = results[i];
    });

    const ready = results.every((r) => r.ok);
    if (!ready) {
      request.log.warn({ event: 'health.not_ready', checks }, 'health.not_ready');
    }
    return reply.status(ready ? 200 : 503).send({ status: ready ? 'ready' : 'unavailable', stage: opts.stage, checks });
  });
}
