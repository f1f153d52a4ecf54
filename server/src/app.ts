import cors from "cors";
import express, { type ErrorRequestHandler, type Response } from "express";
import { createLadderRoutes, type LadderRoutesOptions, type RouteResult } from "./routes.js";

function send<T>(res: Response, result: RouteResult<T>): void {
  res.status(result.status).json(result.body);
}

// express.json() tags the errors it raises for bad bodies (400, 413, 415) with their status.
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("status" in error)) return null;
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export function createApp(options: LadderRoutesOptions): express.Express {
  const routes = createLadderRoutes(options);
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    send(res, routes.health());
  });

  app.get("/api/ladder", (req, res) => {
    send(res, routes.ladder(req.query));
  });

  app.get("/api/neighbors/:word", (req, res) => {
    send(res, routes.neighbors(req.params));
  });

  app.post("/api/ladder/check", (req, res) => {
    send(res, routes.checkLadder(req.body));
  });

  const handleError: ErrorRequestHandler = (error, req, res, _next) => {
    const status = clientErrorStatus(error);
    if (status === 413) {
      res.status(status).json({ message: "Request body too large", code: "PAYLOAD_TOO_LARGE" });
      return;
    }
    if (status !== null) {
      res.status(status).json({ message: "Malformed request body", code: "BAD_REQUEST" });
      return;
    }
    console.error(`[http] ${req.method} ${req.path} failed`, error);
    res.status(500).json({ message: "Internal server error", code: "INTERNAL" });
  };
  app.use(handleError);

  return app;
}
