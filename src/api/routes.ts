import { Router, Request, Response } from "express";
import { runProjection } from "../engine/projection";
import { stampDuty } from "../engine/stampDuty";
import { DEFAULT_SETTINGS, settingsToRequest, withDefaults } from "../models/Settings";
import { ReportStore } from "../reports/reportStore";
import { isInvalidInputError } from "../utils/errors";
import { AppConfig, loadConfig } from "../utils/config";
import {
  AnalysisRequestSchema,
  CalculatorSettingsSchema,
  SaveReportSchema,
  StampDutyQuerySchema,
  parseOrThrow,
} from "../utils/validation";

/**
 * Turn an engine failure into a response: invalid input is a 400 listing every
 * failed precondition, anything else a logged 500.
 */
function sendError(res: Response, context: string, error: unknown): Response {
  if (isInvalidInputError(error)) {
    return res.status(400).json({
      error: "Invalid input",
      issues: error.issues,
    });
  }
  console.error(`${context}:`, error);
  return res.status(500).json({
    error: "Internal server error",
    message: error instanceof Error ? error.message : String(error),
  });
}

function parseReportId(raw: string): number | null {
  const id = Number(raw);
  return Number.isInteger(id) && id >= 0 ? id : null;
}

/**
 * Build the API router around a report store.
 */
export function createRouter(
  reportStore: ReportStore = new ReportStore(),
  config: AppConfig = loadConfig()
): Router {
  const router = Router();
  const projectionOptions = { debug: config.projectionDebug };

  /**
   * GET /api/analyze
   * Get information about the analysis endpoint
   */
  router.get("/analyze", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Project buying against renting: yearly cash flows, balance sheets, NPV and a recommendation",
      endpoint: "/api/analyze",
      requiredFields: ["buy", "rent", "common", "policy (optional)"],
      note: "Rates are decimal fractions (0.045 for 4.5%). Use POST /api/analyze/settings to send calculator settings in percent.",
    });
  });

  /**
   * POST /api/analyze
   * Run a projection from engine parameters
   */
  router.post("/analyze", (req: Request, res: Response) => {
    try {
      const { policy, ...request } = parseOrThrow(AnalysisRequestSchema, req.body);
      const result = runProjection(request, policy, projectionOptions);
      res.json(result);
    } catch (error) {
      sendError(res, "Error in analysis", error);
    }
  });

  /**
   * POST /api/analyze/settings
   * Run a projection from calculator settings; missing settings take their defaults
   */
  router.post("/analyze/settings", (req: Request, res: Response) => {
    try {
      const partial = parseOrThrow(CalculatorSettingsSchema.partial(), req.body ?? {});
      const settings = parseOrThrow(CalculatorSettingsSchema, withDefaults(partial));
      const request = settingsToRequest(settings);
      const result = runProjection(request, {}, projectionOptions);
      res.json({ request, result });
    } catch (error) {
      sendError(res, "Error in settings analysis", error);
    }
  });

  /**
   * GET /api/settings/defaults
   */
  router.get("/settings/defaults", (req: Request, res: Response) => {
    res.json(DEFAULT_SETTINGS);
  });

  /**
   * GET /api/stamp-duty?propertyValue=300000&secondHome=false
   */
  router.get("/stamp-duty", (req: Request, res: Response) => {
    try {
      const query = parseOrThrow(StampDutyQuerySchema, req.query);
      res.json({
        propertyValue: query.propertyValue,
        isSecondHome: query.secondHome,
        stampDuty: stampDuty(query.propertyValue, query.secondHome),
      });
    } catch (error) {
      sendError(res, "Error in stamp duty calculation", error);
    }
  });

  /**
   * GET /api/reports
   */
  router.get("/reports", (req: Request, res: Response) => {
    res.json({ reports: reportStore.list() });
  });

  /**
   * POST /api/reports
   * Run the settings and save the analysis with an optional comment
   */
  router.post("/reports", (req: Request, res: Response) => {
    try {
      const body = parseOrThrow(SaveReportSchema, req.body ?? {});
      const settings = parseOrThrow(CalculatorSettingsSchema, withDefaults(body.settings));
      const result = runProjection(settingsToRequest(settings), {}, projectionOptions);
      const id = reportStore.save(settings, result, body.comment);
      res.status(201).json({ id });
    } catch (error) {
      sendError(res, "Error saving report", error);
    }
  });

  /**
   * GET /api/reports/:id
   */
  router.get("/reports/:id", (req: Request, res: Response) => {
    const id = parseReportId(req.params.id);
    const report = id === null ? null : reportStore.get(id);
    if (!report) {
      return res.status(404).json({ error: `Report ${req.params.id} not found` });
    }
    res.json(report);
  });

  /**
   * DELETE /api/reports/:id
   */
  router.delete("/reports/:id", (req: Request, res: Response) => {
    const id = parseReportId(req.params.id);
    if (id === null || !reportStore.delete(id)) {
      return res.status(404).json({ error: `Report ${req.params.id} not found` });
    }
    res.status(204).send();
  });

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Buy vs Rent Projection API",
      version: "1.0.0",
      endpoints: {
        analyze: "POST /api/analyze - Project buying against renting from engine parameters",
        analyzeSettings: "POST /api/analyze/settings - Project from calculator settings (percent)",
        defaults: "GET /api/settings/defaults - Default calculator settings",
        stampDuty: "GET /api/stamp-duty - Stamp duty for a property value",
        reports: "GET|POST /api/reports, GET|DELETE /api/reports/:id - Saved reports",
        health: "GET /api/health - Health check",
      },
    });
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return router;
}
