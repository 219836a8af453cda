import { CalculatorSettings } from "./Settings";
import { ProjectionResult } from "./ProjectionResult";

/**
 * Saved report data structures
 */

export interface SavedReport {
  id: number;
  timestamp: string; // ISO 8601
  settings: CalculatorSettings;
  result: ProjectionResult;
  comment: string;
  npv: { buy: number; rent: number };
  finalBalance: { buy: number; rent: number };
}

export type ReportSummary = Omit<SavedReport, "result" | "settings"> & {
  propertyValue: number;
};

/**
 * Get the listing view of a report
 */
export function toReportSummary(report: SavedReport): ReportSummary {
  return {
    id: report.id,
    timestamp: report.timestamp,
    comment: report.comment,
    npv: report.npv,
    finalBalance: report.finalBalance,
    propertyValue: report.settings.propertyValue,
  };
}
