import { createTransport, type SendMailOptions } from "nodemailer";
import type { SmtpSettings } from "./settings";
import type { Digest } from "./types";

export type Envelope = {
  from: string;
  to: string[];
  cc: string[];
};

const PREVIEW_SENDER = "fundscout@localhost";

export const toMailOptions = (digest: Digest, envelope: Envelope): SendMailOptions => ({
  from: envelope.from || PREVIEW_SENDER,
  to: envelope.to,
  cc: envelope.cc.length ? envelope.cc : undefined,
  subject: digest.subject,
  text: digest.text,
  html: digest.html,
  attachments: [
    {
      filename: digest.attachment.filename,
      content: digest.attachment.content,
      contentType: "text/csv; charset=utf-8",
    },
  ],
});

/** Port 465 uses implicit TLS; any other port upgrades with STARTTLS. */
export const sendDigest = async (message: SendMailOptions, smtp: SmtpSettings) => {
  const transporter = createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    auth: {
      user: smtp.user,
      pass: smtp.pass,
    },
  });
  try {
    return await transporter.sendMail(message);
  } finally {
    transporter.close();
  }
};

/** Renders the full MIME message without any network access. */
export const renderEml = async (message: SendMailOptions): Promise<Buffer> => {
  const transporter = createTransport({ streamTransport: true, buffer: true, newline: "unix" });
  const info = await transporter.sendMail(message);
  if (!Buffer.isBuffer(info.message)) {
    throw new Error("Preview transport returned a stream instead of a buffer");
  }
  return info.message;
};
