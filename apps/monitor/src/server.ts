import Fastify from "fastify";

import { createMonitorServices } from "./bootstrap";
import { loadEnv, parseMonitorEnv } from "./env";
import { registerMonitorRoutes } from "./routes";

loadEnv();
const env = parseMonitorEnv();

const app = Fastify({ logger: { level: env.LOG_LEVEL } });

app.addHook("onRequest", async (req, reply) => {
  reply.header("Access-Control-Allow-Origin", "*");
  reply.header("Access-Control-Allow-Headers", "content-type");
  reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
  if (req.method === "OPTIONS") return reply.code(204).send();
});

async function main(): Promise<void> {
  const services = await createMonitorServices(env, app.log);
  app.addHook("onClose", async () => {
    await services.close();
  });
  registerMonitorRoutes(app, services.runtime);

  await app.listen({ port: env.PORT, host: env.HOST });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
