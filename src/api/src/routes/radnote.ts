import { Router, Request, Response, RequestHandler } from "express";
import { decodeTelemetryEnvelope } from "@radnote/shared";
import type { AppContext } from "../context";
import { abortOnClose } from "../middleware/body";
import { evaluateWarningRegion } from "../services/geofence";
import { buildWarningFeed } from "../services/json-feed";
import { LockAbortedError } from "../services/mutex";
import { parseLocationQuery } from "./location-query";
import { sendDeviceListing } from "./listing";

export function createIngestHandler({ store, logger }: AppContext): RequestHandler {
  return async (req: Request, res: Response) => {
    try {
      const decoded = decodeTelemetryEnvelope(req.body);
      if (!decoded.success) {
        logger.warn({ bytes: req.rawBodyLength, issues: decoded.error.issues.length }, "Rejected malformed event");
        res.status(400).json({ error: "Validation failed", details: decoded.error.flatten() });
        return;
      }

      const { envelope } = decoded;
      const accepted = await store.recordEvent(envelope, abortOnClose(res));
      logger.debug(
        {
          deviceId: envelope.deviceId,
          file: envelope.notefileKind,
          when: envelope.occurredAt,
          bytes: req.rawBodyLength,
          accepted,
        },
        "Event received"
      );

      res.json({ accepted });
    } catch (err) {
      if (err instanceof LockAbortedError) {
        logger.debug("Client left before event was recorded");
        return;
      }
      logger.error({ err }, "Event ingest failed");
      res.status(500).json({ error: "Internal server error" });
    }
  };
}

export function createWarningFeedHandler({ store, config, logger }: AppContext): RequestHandler {
  return async (req: Request, res: Response) => {
    try {
      const query = parseLocationQuery(req.query);
      if (query.kind === "invalid") {
        res.status(400).json({ error: "Validation failed", details: query.error.flatten() });
        return;
      }

      const signal = abortOnClose(res);
      if (query.kind === "listing") {
        await sendDeviceListing(store, res, signal);
        return;
      }

      const point = { latitude: query.latitude, longitude: query.longitude };
      const result = await evaluateWarningRegion(store, config.alert, point, signal);
      if (result.warning) {
        logger.info({ lat: point.latitude, lon: point.longitude }, "Location is inside a warning region");
      }

      res.json(buildWarningFeed(result, point.latitude, point.longitude, config.feedBaseUrl));
    } catch (err) {
      if (err instanceof LockAbortedError) {
        return;
      }
      logger.error({ err }, "Warning feed failed");
      res.status(500).json({ error: "Internal server error" });
    }
  };
}

export default function radnoteRoutes(context: AppContext): Router {
  const router = Router();
  router.post("/radnote", createIngestHandler(context));
  router.get("/radnote", createWarningFeedHandler(context));
  return router;
}
