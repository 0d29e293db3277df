import { Router, Request, Response, RequestHandler } from "express";
import type { AppContext } from "../context";

// Seconds precision, e.g. 2024-03-01T12:00:00Z
export function pingTimestamp(now: Date = new Date()): string {
  return now.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function createHealthHandler({ store }: Pick<AppContext, "store">): RequestHandler {
  return (_req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString(), devices: store.size });
  };
}

export default function healthRoutes(context: AppContext): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.type("text/plain").send("root");
  });

  router.get("/ping", (_req, res) => {
    res.type("text/plain").send(pingTimestamp());
  });

  router.get("/health", createHealthHandler(context));

  return router;
}
