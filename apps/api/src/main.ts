import { createApiApp } from "./app.js";

async function bootstrap(): Promise<void> {
  const { app, config, services } = await createApiApp();
  await app.listen({ host: config.host, port: config.port });

  app.log.info(`Server scout API running at http://${config.host}:${String(config.port)}`);
  void services.orchestrator.requestRefresh({}).completion;

  const shutdown = (signal: string) => {
    app.log.info({ signal }, "shutting down");
    void app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error({ err: error }, "shutdown failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void bootstrap().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
