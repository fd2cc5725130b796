import type { Express, Response } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";
import { ChatRequestSchema, ClassifyRequestSchema } from "@shared/schema";
import { HttpError, NotFoundError, ServiceUnavailableError } from "./errors";
import type { AppServices } from "./services";
import logger from "./utils/logger";
import { sanitizeForOutput } from "./utils/sanitizer";

const PatientIdSchema = z.coerce.number().int().positive();

function sendError(res: Response, error: unknown, context: string) {
  if (error instanceof z.ZodError) {
    return res.status(400).json({
      success: false,
      error: sanitizeForOutput(error.issues[0]?.message ?? "Invalid request"),
    });
  }
  if (error instanceof HttpError) {
    return res.status(error.statusCode).json({
      success: false,
      error: sanitizeForOutput(error.message),
    });
  }
  logger.error(context, { error: error instanceof Error ? error.message : String(error) });
  return res.status(500).json({
    success: false,
    error: "Internal server error",
  });
}

// Aborts outstanding LLM calls when the client goes away before the reply.
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

export async function registerRoutes(app: Express, services: AppServices): Promise<Server> {
  app.post("/api/chat", async (req, res) => {
    try {
      if (!services.chat) {
        throw new ServiceUnavailableError(
          "LLM provider is not configured. Set OPENAI_API_KEY or MISTRAL_API_KEY in environment variables."
        );
      }
      const request = ChatRequestSchema.parse(req.body);
      const reply = await services.chat.handle(request, abortOnDisconnect(res));

      res.json({
        success: true,
        data: {
          ...reply,
          message: sanitizeForOutput(reply.message),
          timestamp: new Date().toISOString(),
        },
      });
    } catch (error) {
      sendError(res, error, "Chat API Error");
    }
  });

  // Routing decision only, no reply generated
  app.post("/api/intent", async (req, res) => {
    try {
      const { message, conversation_history } = ClassifyRequestSchema.parse(req.body);
      const decision = await services.router.route(message, conversation_history ?? [], {
        signal: abortOnDisconnect(res),
      });
      res.json({ success: true, data: decision });
    } catch (error) {
      sendError(res, error, "Intent API Error");
    }
  });

  app.get("/api/appointments", async (req, res) => {
    try {
      const patientId = PatientIdSchema.parse(req.query.patientId);
      const appointments = await services.storage.listAppointments(patientId, {
        includeCancelled: req.query.includeCancelled === "true",
      });
      res.json({ success: true, data: appointments });
    } catch (error) {
      sendError(res, error, "Appointments API Error");
    }
  });

  app.get("/api/conversations/:id", async (req, res) => {
    try {
      const patientId = PatientIdSchema.parse(req.query.patientId);
      const conversation = await services.storage.getConversation(req.params.id);
      if (!conversation || conversation.patientId !== patientId) {
        throw new NotFoundError("Conversation not found or access denied");
      }
      res.json({ success: true, data: conversation });
    } catch (error) {
      sendError(res, error, "Conversation API Error");
    }
  });

  app.get("/api/health", (_req, res) => {
    res.json({
      success: true,
      data: {
        server: "OK",
        timestamp: new Date().toISOString(),
        router: services.router.describe(),
        llm: services.llmConfig.describe(),
        chat: services.chat ? "OK" : "Unavailable",
      },
    });
  });

  const httpServer = createServer(app);
  return httpServer;
}
