import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { DataLoadError, stringifyError } from "../common/errors.js";
import type { Logger } from "../logger.js";
import {
  isValidIsoDate,
  normalizeWhitespace,
  parseNullableNumber,
  parseNullableText,
  parseResultType,
  parseTossDecision,
  parseYesNo,
} from "../normalize.js";
import type { Dataset, MatchRecord } from "../types.js";

export const REQUIRED_COLUMNS = [
  "id",
  "season",
  "city",
  "date",
  "team1",
  "team2",
  "toss_decision",
  "winner",
  "result",
  "result_margin",
  "target_runs",
  "super_over",
  "player_of_match",
  "venue",
] as const;

export const OPTIONAL_COLUMNS = ["toss_winner", "match_type", "method", "target_overs"] as const;

const requiredText = z
  .string()
  .transform(normalizeWhitespace)
  .pipe(z.string().min(1, "must not be empty"));

const nullableText = z.string().transform(parseNullableText);

const nullableNumber = z.string().transform((raw, ctx) => {
  const value = parseNullableNumber(raw);
  if (value === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: "${raw}"` });
    return z.NEVER;
  }
  return value;
});

const optionalText = nullableText.optional();
const optionalNumber = nullableNumber.optional();

const rowSchema = z.object({
  id: requiredText,
  season: requiredText,
  city: nullableText,
  date: z.string().transform((raw, ctx) => {
    const text = normalizeWhitespace(raw);
    if (!isValidIsoDate(text)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable date "${raw}"` });
      return z.NEVER;
    }
    return text;
  }),
  team1: requiredText,
  team2: requiredText,
  toss_decision: z.string().transform((raw, ctx) => {
    const decision = parseTossDecision(raw);
    if (!decision) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown toss decision "${raw}"` });
      return z.NEVER;
    }
    return decision;
  }),
  winner: nullableText,
  result: z.string().transform((raw, ctx) => {
    const result = parseResultType(raw);
    if (!result) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown result type "${raw}"` });
      return z.NEVER;
    }
    return result;
  }),
  result_margin: nullableNumber,
  target_runs: nullableNumber,
  super_over: z.string().transform((raw, ctx) => {
    const flag = parseYesNo(raw);
    if (flag === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `super_over must be Y or N, got "${raw}"` });
      return z.NEVER;
    }
    return flag;
  }),
  player_of_match: nullableText,
  venue: requiredText,
  toss_winner: optionalText,
  match_type: optionalText,
  method: optionalText,
  target_overs: optionalNumber,
});

type ParsedRow = z.infer<typeof rowSchema>;

const tableSchema = z.array(z.array(z.string()));

export interface LoadDatasetOptions {
  logger?: Logger;
}

export async function loadDataset(path: string, options: LoadDatasetOptions = {}): Promise<Dataset> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new DataLoadError(path, `cannot read file (${stringifyError(error)})`, { cause: error });
  }
  const dataset = parseDataset(path, text, options);
  options.logger?.info(`Loaded ${dataset.records.length} matches from ${path}`);
  return dataset;
}

export function parseDataset(source: string, text: string, options: LoadDatasetOptions = {}): Dataset {
  const table = parseTable(source, text);
  const [header, ...body] = table;
  if (!header || header.length === 0) {
    throw new DataLoadError(source, "file is empty");
  }
  const columns = header.map((name) => normalizeWhitespace(name));
  checkColumns(source, columns, options.logger);

  const records: MatchRecord[] = [];
  for (let index = 0; index < body.length; index += 1) {
    // Header is line 1.
    const line = index + 2;
    const raw: Record<string, string> = {};
    columns.forEach((column, position) => {
      raw[column] = body[index][position] ?? "";
    });
    const parsed = rowSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DataLoadError(source, `line ${line}: ${issue.path.join(".")}: ${issue.message}`);
    }
    records.push(toMatchRecord(source, line, parsed.data));
  }

  return Object.freeze({ source, records: Object.freeze(records) });
}

function parseTable(source: string, text: string): string[][] {
  let output: unknown;
  try {
    output = parse(text, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new DataLoadError(source, `malformed CSV (${stringifyError(error)})`, { cause: error });
  }
  const table = tableSchema.safeParse(output);
  if (!table.success) {
    throw new DataLoadError(source, "malformed CSV table");
  }
  return table.data;
}

function checkColumns(source: string, columns: string[], logger?: Logger): void {
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) {
      throw new DataLoadError(source, `duplicate column "${column}"`);
    }
    seen.add(column);
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !seen.has(column));
  if (missing.length > 0) {
    throw new DataLoadError(source, `missing columns: ${missing.join(", ")}`);
  }

  const known = new Set<string>([...REQUIRED_COLUMNS, ...OPTIONAL_COLUMNS]);
  const ignored = columns.filter((column) => !known.has(column));
  if (ignored.length > 0) {
    logger?.debug(`Ignoring dataset columns: ${ignored.join(", ")}`);
  }
}

function toMatchRecord(source: string, line: number, row: ParsedRow): MatchRecord {
  if (row.winner !== null && row.winner !== row.team1 && row.winner !== row.team2) {
    throw new DataLoadError(
      source,
      `line ${line}: winner "${row.winner}" is neither "${row.team1}" nor "${row.team2}"`,
    );
  }

  const record: MatchRecord = {
    matchId: row.id,
    date: row.date,
    season: row.season,
    team1: row.team1,
    team2: row.team2,
    winner: row.winner,
    venue: row.venue,
    city: row.city,
    tossDecision: row.toss_decision,
    result: row.result,
    resultMargin: row.result_margin,
    targetRuns: row.target_runs,
    superOver: row.super_over,
    playerOfMatch: row.player_of_match,
    ...(row.toss_winner !== undefined ? { tossWinner: row.toss_winner } : {}),
    ...(row.match_type !== undefined ? { matchType: row.match_type } : {}),
    ...(row.method !== undefined ? { method: row.method } : {}),
    ...(row.target_overs !== undefined ? { targetOvers: row.target_overs } : {}),
  };
  return Object.freeze(record);
}
