/**
 * Contest Detector
 *
 * Scans transcribed text against an ordered rule table and reports the first
 * rule it satisfies. Pure and deterministic.
 *
 * - single-word keyword: must appear as a whole token
 * - phrase keyword (contains whitespace): case-insensitive substring of the text
 * - context words: at least one must appear as a whole token anywhere in the
 *   text. There is no proximity window, so long transcripts trade precision
 *   for recall.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigurationError } from "./errors";

export interface ContestRule {
  keyword: string;
  contextWords: readonly string[] | null;
}

export interface ContestDetection {
  matchedKeyword: string;
  contextWord: string | null;
}

export const DEFAULT_CONTEST_RULES: readonly ContestRule[] = [
  { keyword: "contest", contextWords: null },
  { keyword: "giveaway", contextWords: null },
  { keyword: "give away", contextWords: null },
  { keyword: "sweepstakes", contextWords: null },
  { keyword: "call now", contextWords: null },
  { keyword: "text to win", contextWords: null },
  { keyword: "caller", contextWords: ["now", "call", "number", "lines"] },
  { keyword: "win", contextWords: null },
  { keyword: "winner", contextWords: null },
  { keyword: "prize", contextWords: null },
  { keyword: "tickets", contextWords: ["win", "free", "caller", "giving"] },
];

const STRIP_PATTERN = /^[.,!?()[\]{};"']+|[.,!?()[\]{};"']+$/g;

/**
 * Lowercased whole words with surrounding punctuation removed.
 */
export function tokenize(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const raw of text.toLowerCase().split(/\s+/)) {
    const token = raw.replace(STRIP_PATTERN, "");
    if (token) {
      tokens.add(token);
    }
  }
  return tokens;
}

function keywordMatches(keyword: string, tokens: Set<string>, lowerText: string): boolean {
  const normalized = keyword.trim().toLowerCase();
  if (!normalized) {
    return false;
  }
  return /\s/.test(normalized) ? lowerText.includes(normalized) : tokens.has(normalized);
}

export function detectContest(
  text: string,
  rules: readonly ContestRule[] = DEFAULT_CONTEST_RULES
): ContestDetection | null {
  const tokens = tokenize(text);
  const lowerText = text.toLowerCase();

  for (const rule of rules) {
    if (!keywordMatches(rule.keyword, tokens, lowerText)) {
      continue;
    }

    if (!rule.contextWords || rule.contextWords.length === 0) {
      return { matchedKeyword: rule.keyword, contextWord: null };
    }

    const contextWord = rule.contextWords.find((word) => tokens.has(word.toLowerCase()));
    if (contextWord !== undefined) {
      return { matchedKeyword: rule.keyword, contextWord };
    }
  }

  return null;
}

const contestRulesFileSchema = z.array(
  z.object({
    keyword: z.string().trim().min(1),
    contextWords: z.array(z.string().trim().min(1)).nullable().default(null),
  })
).min(1);

/**
 * Loads an ordered rule table from a JSON file of
 * `[{ "keyword": "...", "contextWords": ["..."] | null }]`.
 */
export function loadContestRules(filePath: string): ContestRule[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Cannot read contest rules from ${filePath}`, { cause: error });
  }

  const parsed = contestRulesFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid contest rules in ${filePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}
