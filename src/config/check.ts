import { readConfigFile } from "./loader";
import { ConfigValidationError, ConfigurationError } from "../core/errors";
import { buildNaclPlan } from "../core/planner";
import { describePlan } from "../core/plan-report";

export interface ConfigCheck {
  valid: boolean;
  lines: string[];
}

/** Loads, validates and plans a config file, returning the report lines instead of throwing. */
export function checkConfigFile(configPath: string): ConfigCheck {
  try {
    const plan = buildNaclPlan(readConfigFile(configPath));
    return { valid: true, lines: [`✅ ${configPath} is valid`, ...describePlan(plan)] };
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return {
        valid: false,
        lines: [
          `❌ ${configPath} failed validation:`,
          ...error.issues.map((issue, index) => `  ${index + 1}. ${issue}`),
          `💡 Fix these ${error.issues.length} issues and try again.`,
        ],
      };
    }
    if (error instanceof ConfigurationError) {
      return { valid: false, lines: [`❌ ${error.input}: ${error.constraint}`] };
    }
    throw error;
  }
}
