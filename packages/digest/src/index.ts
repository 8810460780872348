import { loadDotEnv } from "@fundscout/ingest/env";
import { loadDigestRows } from "./lib/loader";
import { sendDigest, toMailOptions } from "./lib/mailer";
import { writePreview } from "./lib/preview";
import { buildDigest } from "./lib/render";
import { loadDigestConfig } from "./lib/settings";

const main = async () => {
  loadDotEnv();
  const config = loadDigestConfig(process.argv.slice(2));
  const now = new Date();

  const rows = loadDigestRows(config.csvPath, config.days, now);
  console.log(`[digest] ${rows.length} row(s) in the last ${config.days} days from ${config.csvPath}`);

  // An empty window still produces a digest.
  const digest = buildDigest(rows, config, now);
  const message = toMailOptions(digest, {
    from: config.smtp.user,
    to: config.mailTo,
    cc: config.mailCc,
  });

  if (config.dryRun) {
    const files = await writePreview(config.previewDir, digest, message);
    console.log(`[digest] preview written: ${files.html} | ${files.eml} | ${files.csv} (dry run)`);
    return;
  }

  await sendDigest(message, config.smtp);
  console.log(`Digest sent to ${config.mailTo.length + config.mailCc.length} recipient(s).`);
};

main().catch((error) => {
  console.error("Digest failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
