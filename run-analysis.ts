import * as fs from "fs";
import * as path from "path";
import { runProjection } from "./src/engine/projection";
import { AnalysisRequest, ProjectionPolicy } from "./src/models/Scenario";
import { settingsToRequest, withDefaults } from "./src/models/Settings";
import { isInvalidInputError } from "./src/utils/errors";
import { loadConfig } from "./src/utils/config";
import {
  AnalysisRequestSchema,
  CalculatorSettingsSchema,
  parseOrThrow,
} from "./src/utils/validation";

/**
 * Run a buy vs rent projection and write the result as JSON.
 * Usage: npx ts-node run-analysis.ts [input-file] [output-file]
 * Default input: example-request.json, default output: analysis-output.json
 *
 * The input is either an analysis request ({ buy, rent, common, policy? }) with
 * rates as fractions, or calculator settings in percent merged over the defaults.
 */
const inputPath = process.argv[2] ?? "example-request.json";
const outputPath = process.argv[3] ?? "analysis-output.json";

let inputData: unknown;
try {
  const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
  inputData = JSON.parse(raw);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
  process.exit(1);
}

try {
  let request: AnalysisRequest;
  let policy: Partial<ProjectionPolicy> = {};
  if (inputData && typeof inputData === "object" && "buy" in inputData) {
    const parsed = parseOrThrow(AnalysisRequestSchema, inputData);
    request = { buy: parsed.buy, rent: parsed.rent, common: parsed.common };
    policy = parsed.policy ?? {};
  } else {
    const partial = parseOrThrow(CalculatorSettingsSchema.partial(), inputData ?? {});
    const settings = parseOrThrow(CalculatorSettingsSchema, withDefaults(partial));
    request = settingsToRequest(settings);
  }

  console.log(`Running projection over ${request.common.sellAfterYears} years...`);
  const result = runProjection(request, policy, { debug: loadConfig().projectionDebug });
  fs.writeFileSync(outputPath, JSON.stringify(result, null, 2));
  console.log(`Projection saved to ${outputPath}`);
  console.log(`\n${result.recommendation.explanation}`);
} catch (err) {
  if (isInvalidInputError(err)) {
    console.error("Input is invalid:");
    for (const issue of err.issues) {
      console.error(`  ${issue.path || "(root)"}: ${issue.message}`);
    }
  } else {
    console.error("Projection failed:", err);
  }
  process.exit(1);
}
