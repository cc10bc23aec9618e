import { randomUUID } from "node:crypto";
import express from "express";
import { z } from "zod";
import { MAX_TIMEOUT_SECONDS } from "./config.js";
import { fieldMapSchema, schemaFromFields } from "./field-schema.js";
import type { StructuredInvocationService } from "./invocation/service.js";
import type { Logger } from "./logger.js";
import { listProviderProfiles, resolveProvider } from "./providers.js";

export const structuredRequestBodySchema = z.object({
  prompt: z.string().min(1),
  provider: z.string().min(1).optional(),
  timeoutSeconds: z.number().positive().max(MAX_TIMEOUT_SECONDS).optional(),
  fields: fieldMapSchema
});

export type StructuredRequestBody = z.infer<typeof structuredRequestBodySchema>;

interface AppOptions {
  service: StructuredInvocationService;
  logger: Logger;
}

const getHeaderValue = (raw: string | undefined): string | undefined => {
  if (!raw) {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

export function createApp(options: AppOptions): express.Express {
  const { service, logger } = options;
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/providers", (_req, res) => {
    res.json({ providers: listProviderProfiles() });
  });

  app.get("/providers/:id/availability", (req, res) => {
    const profile = resolveProvider(req.params.id);
    res.json({
      provider: req.params.id,
      executableName: profile.executableName,
      available: service.isAvailable(req.params.id)
    });
  });

  app.post("/structured", async (req, res) => {
    const body = structuredRequestBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: "Invalid request body", issues: body.error.issues });
      return;
    }

    try {
      const result = await service.invoke({
        prompt: body.data.prompt,
        schema: schemaFromFields(body.data.fields),
        provider: body.data.provider,
        timeoutSeconds: body.data.timeoutSeconds,
        requestId: getHeaderValue(req.header("x-request-id")) ?? randomUUID(),
        traceId: getHeaderValue(req.header("x-trace-id")) ?? randomUUID()
      });
      if (result.ok) {
        res.json({ value: result.value });
        return;
      }
      res.status(result.error.statusCode).json({
        error: result.error.message,
        kind: result.error.kind
      });
    } catch (error) {
      logger.error({ error, operation: "structured_invocation" }, "structured route failed");
      res.status(500).json({ error: "Internal server error" });
    }
  });

  return app;
}
