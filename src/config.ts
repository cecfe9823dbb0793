import { z } from "zod";
import { DEFAULT_COMPARATIVE_TOP_TEAMS } from "./analysis/analyze.js";
import { DEFAULT_VENUE_TOP_TEAMS } from "./metrics/venue.js";
import { ENTITY_CATEGORIES, VIEW_NAMES, type RunConfig } from "./types.js";

const schema = z.object({
  command: z.enum(["categories", "values", "analyze"]),
  dataPath: z.string().min(1),
  format: z.enum(["text", "json"]),
  category: z.enum(ENTITY_CATEGORIES).optional(),
  primary: z.string().optional(),
  secondary: z.string().optional(),
  views: z.array(z.enum(VIEW_NAMES)),
  venueTopTeams: z.number().int().positive().max(50),
  comparativeTopTeams: z.number().int().positive().max(20),
  debug: z.boolean(),
});

const DEFAULTS = {
  dataPath: "./data/matches.csv",
  format: "text",
  venueTopTeams: DEFAULT_VENUE_TOP_TEAMS,
  comparativeTopTeams: DEFAULT_COMPARATIVE_TOP_TEAMS,
  debug: false,
} as const;

interface CliRaw {
  positionals: string[];
  flags: Record<string, string | boolean>;
}

export function buildRunConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const args = parseCliArgs(argv);
  const category = readCategory(args.flags, "category");

  const parsed = schema.parse({
    command: args.positionals[0] ?? (category ? "analyze" : "categories"),
    dataPath: readString(args.flags, "data", env.MATCH_DATASET_PATH || DEFAULTS.dataPath),
    format: readString(args.flags, "format", DEFAULTS.format),
    category,
    primary: readOptionalString(args.flags, "primary"),
    secondary: readOptionalString(args.flags, "secondary"),
    views: readList(args.flags, "views"),
    venueTopTeams: readInt(args.flags, "venue-top", DEFAULTS.venueTopTeams),
    comparativeTopTeams: readInt(args.flags, "compare-top", DEFAULTS.comparativeTopTeams),
    debug: readBool(args.flags, "debug", readEnvBool(env, "MATCH_COMPARE_DEBUG", DEFAULTS.debug)),
  });

  if (parsed.command !== "categories" && !parsed.category) {
    throw new Error(`Command "${parsed.command}" needs --category (${ENTITY_CATEGORIES.join(", ")}).`);
  }

  return parsed;
}

function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = { positionals: [], flags: {} };
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      out.positionals.push(token);
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      out.flags[key] = true;
      continue;
    }
    out.flags[key] = next;
    i += 1;
  }
  return out;
}

// Accepts any casing ("team", "TEAM"); unknown names pass through for zod to reject.
function readCategory(flags: CliRaw["flags"], key: string): string | undefined {
  const value = readOptionalString(flags, key);
  if (value === undefined) {
    return undefined;
  }
  const match = ENTITY_CATEGORIES.find(
    (category) => category.toLowerCase() === value.trim().toLowerCase(),
  );
  return match ?? value;
}

function readString(flags: CliRaw["flags"], key: string, fallback: string): string {
  const value = flags[key];
  if (typeof value === "string") {
    return value;
  }
  return fallback;
}

function readOptionalString(flags: CliRaw["flags"], key: string): string | undefined {
  const value = flags[key];
  if (typeof value !== "string") {
    return undefined;
  }
  return value;
}

function readList(flags: CliRaw["flags"], key: string): string[] {
  const value = flags[key];
  if (typeof value !== "string") {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

function readInt(flags: CliRaw["flags"], key: string, fallback: number): number {
  const value = flags[key];
  if (typeof value !== "string") {
    return fallback;
  }
  return Number.parseInt(value, 10);
}

function readBool(flags: CliRaw["flags"], key: string, fallback: boolean): boolean {
  const value = flags[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  return parseBoolText(value) ?? fallback;
}

function readEnvBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (!raw) {
    return fallback;
  }
  return parseBoolText(raw) ?? fallback;
}

function parseBoolText(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return undefined;
}
