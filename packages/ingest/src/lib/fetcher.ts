export type PageFetcher = (url: string) => Promise<string | null>;

const USER_AGENT = "Mozilla/5.0 (compatible; FundScout/1.0)";

/**
 * Fetches an article page. Any timeout, network error, non-200 status or
 * non-HTML content type yields null.
 */
export const fetchHtml = async (url: string, timeoutMs = 30000): Promise<string | null> => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        "User-Agent": USER_AGENT,
      },
    });

    if (response.status !== 200) {
      return null;
    }
    if (!(response.headers.get("content-type") ?? "").includes("text/html")) {
      return null;
    }

    return await response.text();
  } catch {
    return null;
  } finally {
    clearTimeout(timeout);
  }
};

export const createPageFetcher = (timeoutMs: number): PageFetcher =>
  (url) => fetchHtml(url, timeoutMs);
