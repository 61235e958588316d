import express, { type Request, type Response, type NextFunction } from "express";
import session from "express-session";
import { registerRoutes } from "./routes";
import { addSecurityHeaders, getSecureCookieConfig, getSessionSecret } from "./middleware/security";
import { handleRouteError } from "./utils/errorHandler";
import { sessionRegistry } from "./session/sessionRegistry";
import { SESSION_CONSTANTS } from "./config/constants";

const app = express();

app.set("trust proxy", 1);
app.use(addSecurityHeaders);
app.use(express.json({ limit: "100kb" }));
app.use(
  session({
    secret: getSessionSecret(),
    resave: false,
    saveUninitialized: true,
    cookie: getSecureCookieConfig(),
  }),
);

function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  console.log(`${formattedTime} [${source}] ${message}`);
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    if (path.startsWith("/api")) {
      const duration = Date.now() - start;
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

(async () => {
  const server = await registerRoutes(app);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleRouteError(res, err, "Express");
  });

  // express-session's memory store expires idle sessions on its own; keep the registry in step
  setInterval(() => {
    const dropped = sessionRegistry.prune(SESSION_CONSTANTS.SESSION_TTL_MS);
    if (dropped > 0) log(`pruned ${dropped} idle chat sessions`, "sessions");
  }, 60 * 60 * 1000).unref();

  const port = parseInt(process.env.PORT || "5000", 10);
  server.listen(port, "0.0.0.0", () => {
    log(`serving on port ${port}`);
  });
})().catch(error => {
  console.error("[Server] Failed to start:", error);
  process.exit(1);
});
