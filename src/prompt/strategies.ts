import { STRATEGY_NAMES } from "../config/schema";
import type { StrategyName } from "../config/schema";

export const DEFAULT_STRATEGY: StrategyName = "magic_split_optimization";

export const STRATEGY_DESCRIPTIONS: Record<StrategyName, string> = {
  magic_split_optimization: "Magic Split optimization - overall analysis and split-buying plan",
  short_term_discovery: "Short-term discovery - screen for short-horizon upside",
  buy_timing_diagnosis: "Buy timing diagnosis - is now a sensible entry point",
  hold_or_cut_decision: "Hold or cut - keep or sell an existing position",
  valuation_analysis: "Valuation analysis - fair value and price targets"
};

/** Menu keys `1`..`5` in the order of `STRATEGY_NAMES`. */
export const STRATEGY_KEYS: Record<string, StrategyName> = Object.fromEntries(
  STRATEGY_NAMES.map((name, index) => [String(index + 1), name])
);

export function isStrategyName(value: string): value is StrategyName {
  return (STRATEGY_NAMES as readonly string[]).includes(value);
}

/**
 * Map menu input to a strategy: a key, a strategy name, or an empty line for
 * the default. Anything else, or a strategy not in `available`, is null.
 */
export function resolveStrategy(
  input: string,
  available: readonly StrategyName[] = STRATEGY_NAMES
): StrategyName | null {
  const value = input.trim().toLowerCase();
  const candidate = value === "" ? DEFAULT_STRATEGY : STRATEGY_KEYS[value] ?? (isStrategyName(value) ? value : null);
  if (!candidate || !available.includes(candidate)) return null;
  return candidate;
}

export function describeStrategy(name: StrategyName): string {
  return STRATEGY_DESCRIPTIONS[name];
}

const STOCK_CODE_PATTERN = /^\d{6}$/;

export function validateStockCode(input: string): string | null {
  const code = input.trim();
  return STOCK_CODE_PATTERN.test(code) ? code : null;
}
