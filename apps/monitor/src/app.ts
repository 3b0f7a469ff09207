import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

/** Fastify instance with the monitor's CORS handling; routes are registered separately. */
export function createMonitorApp(opts: FastifyServerOptions = { logger: true }): FastifyInstance {
  const app = Fastify(opts);

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  return app;
}
