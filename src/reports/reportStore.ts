import { CalculatorSettings } from "../models/Settings";
import { ProjectionResult } from "../models/ProjectionResult";
import { ReportSummary, SavedReport, toReportSummary } from "../models/Report";

/**
 * In-memory store of saved analyses.
 *
 * Ids are sequential per store and are not reused after a report is deleted.
 * Nothing is written to disk; each API app owns one store.
 */
export class ReportStore {
  private reports: Map<number, SavedReport> = new Map();
  private nextId = 0;
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  /**
   * Save a projection together with the settings that produced it
   * @returns The new report's id
   */
  save(settings: CalculatorSettings, result: ProjectionResult, comment: string = ""): number {
    const id = this.nextId++;
    this.reports.set(id, {
      id,
      timestamp: this.now().toISOString(),
      settings: { ...settings },
      result,
      comment,
      npv: { buy: result.npv.buy, rent: result.npv.rent },
      finalBalance: {
        buy: result.totals.finalBuyBalance,
        rent: result.totals.finalRentBalance,
      },
    });
    return id;
  }

  /**
   * List reports in the order they were saved
   */
  list(): ReportSummary[] {
    return [...this.reports.values()].map(toReportSummary);
  }

  get(id: number): SavedReport | null {
    return this.reports.get(id) ?? null;
  }

  /**
   * @returns True if a report was removed
   */
  delete(id: number): boolean {
    return this.reports.delete(id);
  }

  get size(): number {
    return this.reports.size;
  }
}
