import { isAbsolute, resolve } from "path";

export type Flags = Map<string, string | true>;

/**
 * Reads `--name=value`, `--name value` and bare `--name` flags. Names listed
 * in `booleanFlags` never consume the following argument.
 */
export const parseFlags = (argv: string[], booleanFlags: ReadonlySet<string> = new Set()): Flags => {
  const flags: Flags = new Map();
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      continue;
    }
    const body = arg.slice(2);
    const eqIdx = body.indexOf("=");
    if (eqIdx !== -1) {
      flags.set(body.slice(0, eqIdx), body.slice(eqIdx + 1));
      continue;
    }
    const next = argv[i + 1];
    if (!booleanFlags.has(body) && next !== undefined && !next.startsWith("--")) {
      flags.set(body, next);
      i += 1;
      continue;
    }
    flags.set(body, true);
  }
  return flags;
};

export const flagValue = (flags: Flags, name: string) => {
  const value = flags.get(name);
  return typeof value === "string" ? value : undefined;
};

export const coercePositiveInt = (value: string | undefined) => {
  if (!value) {
    return null;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return Math.floor(parsed);
};

/** Day windows: 0 means today only. */
export const coerceNonNegativeInt = (value: string | undefined) => {
  const parsed = coerceNonNegativeNumber(value);
  return parsed === null ? null : Math.floor(parsed);
};

export const coerceNonNegativeNumber = (value: string | undefined) => {
  if (!value) {
    return null;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return null;
  }
  return parsed;
};

export const requireEnv = (env: NodeJS.ProcessEnv, key: string) => {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required env var: ${key}`);
  }
  return value;
};

/**
 * Relative paths are read against the directory npm was invoked from
 * (`INIT_CWD`), not the workspace package npm runs the script in.
 */
export const resolveFromInvocationDir = (env: NodeJS.ProcessEnv, filePath: string) => {
  const base = env.INIT_CWD;
  return base && !isAbsolute(filePath) ? resolve(base, filePath) : filePath;
};
