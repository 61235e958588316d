import type { Express, Request } from "express";
import { createServer, type Server } from "http";
import type { ChatQuery } from "@shared/schema";
import { validate, chatSchemas } from "./middleware/validation";
import { handleRouteError } from "./utils/errorHandler";
import { getPromptVersion } from "./config/prompts";
import { sessionRegistry } from "./session/sessionRegistry";
import { clearConversation, handleQuery, loadMore } from "./chat/assistant";

function getChatSession(req: Request) {
  return sessionRegistry.get(req.sessionID);
}

export async function registerRoutes(app: Express): Promise<Server> {
  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      intentPromptVersion: getPromptVersion("SEARCH_INTENT_PROMPT"),
    });
  });

  app.post("/api/chat/query", validate({ body: chatSchemas.query }), async (req, res) => {
    try {
      const { message }: ChatQuery = req.body;
      const result = await handleQuery(getChatSession(req), message);
      res.json(result);
    } catch (error) {
      handleRouteError(res, error, "Chat Query");
    }
  });

  app.post("/api/chat/more", (req, res) => {
    try {
      res.json(loadMore(getChatSession(req)));
    } catch (error) {
      handleRouteError(res, error, "Chat Load More");
    }
  });

  app.get("/api/chat/history", (req, res) => {
    const session = getChatSession(req);
    res.json({
      messages: session.transcript,
      remaining: session.memory.remaining,
    });
  });

  app.post("/api/chat/clear", (req, res) => {
    clearConversation(getChatSession(req));
    res.json({ ok: true });
  });

  app.delete("/api/chat/session", (req, res) => {
    const sessionId = req.sessionID;
    req.session.destroy((error: unknown) => {
      sessionRegistry.discard(sessionId);
      if (error) {
        handleRouteError(res, error, "Chat Session");
        return;
      }
      res.json({ ok: true });
    });
  });

  const httpServer = createServer(app);
  return httpServer;
}
