const normalizeHostname = (hostname: string) =>
  hostname.toLowerCase().replace(/^www\./, "");

export const getHostname = (input: string): string | null => {
  try {
    const url = new URL(input);
    return normalizeHostname(url.hostname);
  } catch {
    return null;
  }
};

export const isListedDomain = (host: string | null, domains: Set<string>) =>
  host !== null && domains.has(host);
