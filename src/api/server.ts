import express from "express";
import { createRouter } from "./routes";
import { ReportStore } from "../reports/reportStore";
import { AppConfig, loadConfig } from "../utils/config";

/**
 * Build the Express app. Each app owns its own report store.
 */
export function createApp(
  reportStore: ReportStore = new ReportStore(),
  config: AppConfig = loadConfig()
): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for development
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, PUT, DELETE, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Routes
  app.use("/api", createRouter(reportStore, config));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Buy vs Rent Projection API",
      version: "1.0.0",
      endpoints: {
        analyze: "POST /api/analyze",
        analyzeSettings: "POST /api/analyze/settings",
        reports: "GET /api/reports",
        health: "GET /api/health",
      },
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    if (err instanceof SyntaxError) {
      return res.status(400).json({
        error: "Malformed JSON body",
        message: err.message,
      });
    }
    console.error("Unhandled error:", err);
    res.status(500).json({
      error: "Internal server error",
      message: err instanceof Error ? err.message : String(err),
    });
  });

  return app;
}

const app = createApp();

// Start server
if (require.main === module) {
  const { port } = loadConfig();
  app.listen(port, () => {
    console.log(`Server running on port ${port}`);
    console.log(`API available at http://localhost:${port}/api`);
  });
}

export default app;
