/**
 * Rule dataset loader: JSON file → zod validation → compiled RuleSet.
 * Anything wrong with the file is a RuleDataError; a scan cannot go on
 * without its rules.
 */
import { readFileSync } from "fs";
import { ZodError } from "zod";
import { RuleSetSchema, type RuleSetData } from "../schemas.js";
import { logger, RuleDataError } from "../utils/index.js";
import { compileSignals, splitRuleKey, type ErrorSuspectRule, type StackSuspectRule } from "./suspect-matcher.js";

export interface RuleSet extends Omit<RuleSetData, "suspects"> {
  suspects: {
    error: ErrorSuspectRule[];
    stack: StackSuspectRule[];
  };
}

function ruleKey(key: string, source: string) {
  const parts = splitRuleKey(key);
  if (!parts) throw new RuleDataError(`Suspect key "${key}" is not of the form "<severity> | <name>"`, source);
  return parts;
}

export function compileRuleSet(input: unknown, source = "<inline>"): RuleSet {
  let data: RuleSetData;
  try {
    data = RuleSetSchema.parse(input);
  } catch (e) {
    if (e instanceof ZodError) {
      const details = e.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new RuleDataError(`Invalid rule dataset: ${details}`, source);
    }
    throw e;
  }

  const error = Object.entries(data.suspects.error).map(([key, signal]) => ({ ...ruleKey(key, source), signal }));
  const stack = Object.entries(data.suspects.stack).map(([key, raw]) => {
    const { severity, name } = ruleKey(key, source);
    return { severity, name, signals: compileSignals(name, raw) };
  });

  return { ...data, suspects: { error, stack } };
}

export function loadRuleSet(path: string): RuleSet {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (e) {
    throw new RuleDataError(`Rule dataset not readable: ${(e as Error).message}`, path);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new RuleDataError(`Rule dataset is not valid JSON: ${(e as Error).message}`, path);
  }

  const rules = compileRuleSet(json, path);
  logger.info(
    `Loaded ${rules.suspects.error.length + rules.suspects.stack.length} suspect rules for ${rules.game.name}`,
    { module: "Rules" },
  );
  return rules;
}
