import { createApp } from "./app.js";
import { JsonlAuditSink } from "./audit.js";
import { loadConfig } from "./config.js";
import { StructuredInvocationService } from "./invocation/service.js";
import { logger } from "./logger.js";

function bootstrap(): void {
  const config = loadConfig();
  const service = new StructuredInvocationService({
    audit: new JsonlAuditSink(config.auditLogDir),
    defaultProvider: config.defaultProvider,
    defaultTimeoutSeconds: config.defaultTimeoutSeconds,
    killGraceMs: config.killGraceMs
  });

  const app = createApp({ service, logger });
  app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        auditLogDir: config.auditLogDir,
        defaultProvider: config.defaultProvider,
        defaultTimeoutSeconds: config.defaultTimeoutSeconds,
        providerAvailable: service.isAvailable(config.defaultProvider)
      },
      "structured cli bridge started"
    );
  });
}

try {
  bootstrap();
} catch (error) {
  logger.error({ error }, "structured cli bridge bootstrap failed");
  process.exit(1);
}
