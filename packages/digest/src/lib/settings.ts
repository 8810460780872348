import {
  coerceNonNegativeInt,
  coercePositiveInt,
  flagValue,
  parseFlags,
  requireEnv,
  resolveFromInvocationDir,
} from "@fundscout/ingest/cli";

export type SmtpSettings = {
  host: string;
  port: number;
  user: string;
  pass: string;
};

export type DigestConfig = {
  days: number;
  csvPath: string;
  dryRun: boolean;
  previewDir: string;
  maxRows: number;
  topic: string;
  smtp: SmtpSettings;
  mailTo: string[];
  mailCc: string[];
};

const splitAddresses = (value: string | undefined) =>
  (value ?? "")
    .split(",")
    .map((address) => address.trim())
    .filter(Boolean);

/**
 * Builds the digest configuration once at start-up. SMTP credentials and
 * recipients are required unless this is a dry run.
 */
export const loadDigestConfig = (argv: string[], env: NodeJS.ProcessEnv = process.env): DigestConfig => {
  const flags = parseFlags(argv, new Set(["dry-run"]));
  const option = (flag: string, envKey: string) => flagValue(flags, flag) ?? env[envKey];
  const dryRun = flags.has("dry-run") || env.DRY_RUN === "1";

  if (!dryRun) {
    for (const key of ["SMTP_USER", "SMTP_PASS", "MAIL_TO"]) {
      requireEnv(env, key);
    }
  }

  return {
    days: coerceNonNegativeInt(option("days", "ANALYSIS_DAYS")) ?? 7,
    csvPath: resolveFromInvocationDir(env, option("csv", "CSV_PATH") || "data/funding_latest.csv"),
    dryRun,
    previewDir: resolveFromInvocationDir(env, option("preview-dir", "PREVIEW_DIR") || "."),
    maxRows: coercePositiveInt(env.DIGEST_MAX_ROWS) ?? 30,
    topic: env.DIGEST_TOPIC || "Restaurant automation",
    smtp: {
      host: env.SMTP_HOST || "smtp.gmail.com",
      port: coercePositiveInt(env.SMTP_PORT) ?? 465,
      user: env.SMTP_USER ?? "",
      pass: env.SMTP_PASS ?? "",
    },
    mailTo: splitAddresses(env.MAIL_TO),
    mailCc: splitAddresses(env.MAIL_CC),
  };
};
