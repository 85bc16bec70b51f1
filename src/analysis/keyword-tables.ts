import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { KeywordTableError } from '../errors.js';
import {
  CATEGORY_PRIORITY,
  SEVERITY_PRIORITY,
  type KeywordCategory,
  type KeywordSeverity,
} from './types.js';

export const DEFAULT_KEYWORDS_FILE = fileURLToPath(new URL('../../data/keywords.json', import.meta.url));

export interface KeywordRule<T extends string> {
  readonly label: T;
  readonly keywords: readonly string[];
}

export interface KeywordTables {
  readonly severity: ReadonlyArray<KeywordRule<KeywordSeverity>>;
  readonly categories: ReadonlyArray<KeywordRule<KeywordCategory>>;
}

export interface KeywordMatch<T extends string> {
  readonly label: T;
  readonly keyword: string;
}

/** Lower-case and collapse runs of whitespace so phrases match across line breaks. */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

const keywordList = z.array(z.string().transform(normalizeText).pipe(z.string().min(1))).min(1);

function sameOrder(actual: readonly string[], expected: readonly string[]): boolean {
  return actual.length === expected.length && actual.every((value, i) => value === expected[i]);
}

export const keywordTablesSchema = z
  .object({
    severity: z.array(z.object({ level: z.enum(SEVERITY_PRIORITY), keywords: keywordList })),
    categories: z.array(z.object({ category: z.enum(CATEGORY_PRIORITY), keywords: keywordList })),
  })
  .superRefine((tables, ctx) => {
    if (!sameOrder(tables.severity.map((r) => r.level), SEVERITY_PRIORITY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['severity'],
        message: `levels must appear exactly once, in the order ${SEVERITY_PRIORITY.join(', ')}`,
      });
    }
    if (!sameOrder(tables.categories.map((r) => r.category), CATEGORY_PRIORITY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['categories'],
        message: `categories must appear exactly once, in the order ${CATEGORY_PRIORITY.join(', ')}`,
      });
    }
  });

/**
 * Validate raw keyword data and freeze it.
 * @param source - where the data came from, for error messages
 */
export function parseKeywordTables(raw: unknown, source: string): KeywordTables {
  const result = keywordTablesSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new KeywordTableError(`Invalid keyword tables in ${source}:\n${issues}`, source, {
      cause: result.error,
    });
  }

  const freezeRule = <T extends string>(label: T, keywords: string[]): KeywordRule<T> =>
    Object.freeze({ label, keywords: Object.freeze([...keywords]) });

  return Object.freeze({
    severity: Object.freeze(result.data.severity.map((r) => freezeRule(r.level, r.keywords))),
    categories: Object.freeze(result.data.categories.map((r) => freezeRule(r.category, r.keywords))),
  });
}

/**
 * Read and validate a keyword table file. Defaults to the bundled tables.
 */
export async function loadKeywordTables(filePath: string = DEFAULT_KEYWORDS_FILE): Promise<KeywordTables> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (err) {
    throw new KeywordTableError(`Failed to read keyword tables: ${filePath}`, filePath, { cause: err });
  }
  return parseKeywordTables(raw, filePath);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Ordered first-match-wins keyword scanner.
 *
 * Keywords match whole words or phrases only, so `down` does not fire on
 * `downstream`. Patterns are compiled once and carry no `g` flag, which keeps
 * `test()` free of `lastIndex` state across calls.
 */
export class KeywordMatcher<T extends string> {
  private readonly compiled: ReadonlyArray<{
    label: T;
    patterns: ReadonlyArray<{ keyword: string; pattern: RegExp }>;
  }>;

  constructor(rules: ReadonlyArray<KeywordRule<T>>) {
    this.compiled = rules.map((rule) => ({
      label: rule.label,
      patterns: rule.keywords.map((keyword) => ({
        keyword,
        pattern: new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword)}(?![a-z0-9])`),
      })),
    }));
  }

  /** Labels in the order they are evaluated. */
  get labels(): T[] {
    return this.compiled.map((rule) => rule.label);
  }

  firstMatch(text: string): KeywordMatch<T> | null {
    const normalized = normalizeText(text);
    for (const rule of this.compiled) {
      const hit = rule.patterns.find((p) => p.pattern.test(normalized));
      if (hit) return { label: rule.label, keyword: hit.keyword };
    }
    return null;
  }
}
