/**
 * Environment utilities for runtime/stage detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Explicit STAGE wins; otherwise derive from NODE_ENV
  const stage = process.env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test";
}

export function isLocal(): boolean {
  // No Lambda execution env means we run on a developer machine
  if (process.env.IS_LOCAL === "true") return true;
  const isLambda = Boolean(
    process.env.AWS_LAMBDA_FUNCTION_NAME || process.env.AWS_EXECUTION_ENV
  );
  return !isLambda;
}

export interface GetEnvVarOptions<T> {
  defaultValue?: T;
  required?: boolean;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

/**
 * Looks up the raw value of an env var, treating "" as unset.
 * When `stageAware` (default), NAME__<stage> shadows NAME.
 */
export function lookupEnvVar(
  name: string,
  stageAware: boolean = true
): string | undefined {
  const candidate = stageAware
    ? process.env[`${name}__${getStage()}`] ?? process.env[name]
    : process.env[name];
  return candidate != null && candidate !== "" ? candidate : undefined;
}

/**
 * Reads and parses an environment variable.
 * - Missing: returns `defaultValue`, or throws when `required` is set.
 * - Present: returns `parse(raw)`; parse errors propagate.
 */
export function getEnvVar<T>(
  name: string,
  parse: (raw: string) => T,
  options: GetEnvVarOptions<T> = {}
): T | undefined {
  const stageAware = options.stageAware !== false;
  const raw = lookupEnvVar(name, stageAware);
  if (raw !== undefined) return parse(raw);

  if (options.defaultValue !== undefined) return options.defaultValue;

  if (options.required) {
    const tried = stageAware ? `${name}__${getStage()} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }
  return undefined;
}

export function getString(name: string): string | undefined;
export function getString(name: string, defaultValue: string): string;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar(name, raw => raw, { defaultValue });
}

export function getNumber(name: string): number | undefined;
export function getNumber(name: string, defaultValue: number): number;
export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  return getEnvVar(
    name,
    raw => {
      const n = Number(raw);
      if (Number.isNaN(n))
        throw new Error(`Env var ${name} is not a number: ${raw}`);
      return n;
    },
    { defaultValue }
  );
}

export function getBoolean(name: string): boolean | undefined;
export function getBoolean(name: string, defaultValue: boolean): boolean;
export function getBoolean(
  name: string,
  defaultValue?: boolean
): boolean | undefined {
  return getEnvVar(
    name,
    raw => {
      const lowered = raw.toLowerCase();
      if (["1", "true", "yes", "y"].includes(lowered)) return true;
      if (["0", "false", "no", "n"].includes(lowered)) return false;
      throw new Error(`Env var ${name} is not a boolean: ${raw}`);
    },
    { defaultValue }
  );
}
