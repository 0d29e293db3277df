import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import type { AppContext } from "./context";
import { jsonBody } from "./middleware/body";

// Route imports
import healthRoutes from "./routes/health";
import radnoteRoutes from "./routes/radnote";
import radiationRoutes from "./routes/radiation";

// body-parser marks bad JSON and oversized bodies with an HTTP status
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export function createApp(context: AppContext): Express {
  const { config, logger } = context;
  const app = express();

  // Global middleware
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));
  app.use(jsonBody);

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 600,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests, please try again later" },
  });
  app.use(limiter);

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info({
        method: req.method,
        url: req.url,
        status: res.statusCode,
        duration: Date.now() - start,
      });
    });
    next();
  });

  // Mount routes
  app.use(healthRoutes(context));
  app.use(radnoteRoutes(context));
  app.use(radiationRoutes(context));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Global error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== null) {
      logger.warn({ err }, "Malformed request");
      res.status(status).json({ error: "Malformed request body" });
      return;
    }
    logger.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
