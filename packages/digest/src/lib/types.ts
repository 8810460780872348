export type DigestRow = {
  /** ISO calendar date of publication. */
  date: string;
  title: string;
  amountUsd: number;
  round: string;
  investors: string;
  sourceDomain: string;
  sourceUrl: string;
  /** Comma-joined display labels. */
  tags: string;
  query: string;
  snippet: string;
};

export type Digest = {
  /** Calendar date the digest was built for. */
  today: string;
  subject: string;
  text: string;
  html: string;
  attachment: {
    filename: string;
    content: string;
  };
  rowCount: number;
};
