/**
 * CLI configuration — options, then env vars, then defaults.
 *
 * Each setting is resolved on its own and only the value that wins is
 * validated, so a bad env var does not matter when an option replaces it.
 */

export type Variant = "local" | "world";
export type OutputFormat = "text" | "json";

export interface CliConfig {
  /** How input bytes are interpreted: plain UTF-8 or XOR-paired. */
  variant: Variant;
  /** How `parse` prints the log. */
  format: OutputFormat;
}

/** Raw command-line values, as commander hands them over. */
export interface CliOverrides {
  variant?: string;
  /** Shorthand for variant "world". */
  world?: boolean;
  format?: string;
}

const VARIANTS: readonly Variant[] = ["local", "world"];
const FORMATS: readonly OutputFormat[] = ["text", "json"];

const DEFAULT_VARIANT: Variant = "local";
const DEFAULT_FORMAT: OutputFormat = "text";

function oneOf<T extends string>(
  allowed: readonly T[],
  value: string,
  name: string,
): T {
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new Error(`Invalid ${name}: "${value}" (expected ${allowed.join(" or ")})`);
  }
  return match;
}

export function parseVariant(value: string, name = "variant"): Variant {
  return oneOf(VARIANTS, value, name);
}

export function parseFormat(value: string, name = "format"): OutputFormat {
  return oneOf(FORMATS, value, name);
}

function resolveVariant(env: NodeJS.ProcessEnv, overrides: CliOverrides): Variant {
  if (overrides.world) {
    if (overrides.variant !== undefined && overrides.variant !== "world") {
      throw new Error(`--world conflicts with --variant ${overrides.variant}`);
    }
    return "world";
  }
  if (overrides.variant !== undefined) return parseVariant(overrides.variant);
  const fromEnv = env["NGLOG_VARIANT"];
  return fromEnv !== undefined ? parseVariant(fromEnv, "NGLOG_VARIANT") : DEFAULT_VARIANT;
}

function resolveFormat(env: NodeJS.ProcessEnv, overrides: CliOverrides): OutputFormat {
  if (overrides.format !== undefined) return parseFormat(overrides.format);
  const fromEnv = env["NGLOG_FORMAT"];
  return fromEnv !== undefined ? parseFormat(fromEnv, "NGLOG_FORMAT") : DEFAULT_FORMAT;
}

/** Resolve config: command-line options > env vars > defaults. */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: CliOverrides = {},
): CliConfig {
  return {
    variant: resolveVariant(env, overrides),
    format: resolveFormat(env, overrides),
  };
}
