import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import type { SendMailOptions } from "nodemailer";
import { renderEml } from "./mailer";
import type { Digest } from "./types";

export type PreviewFiles = {
  html: string;
  eml: string;
  csv: string;
};

/** Writes the HTML body, the full message and the CSV attachment side by side. */
export const writePreview = async (
  dir: string,
  digest: Digest,
  message: SendMailOptions,
): Promise<PreviewFiles> => {
  mkdirSync(dir, { recursive: true });
  const base = join(dir, `preview_week_${digest.today}`);
  const files: PreviewFiles = {
    html: `${base}.html`,
    eml: `${base}.eml`,
    csv: `${base}.csv`,
  };

  writeFileSync(files.html, digest.html, "utf-8");
  writeFileSync(files.eml, await renderEml(message));
  writeFileSync(files.csv, digest.attachment.content, "utf-8");
  return files;
};
