export const createTimeoutSignal = (ms: number): { signal: AbortSignal } => ({
  signal: AbortSignal.timeout(ms),
});

export const SERVICE_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'User-Agent': 'bias-meter/1.0.0',
});

// Sent by the fallback fetch; plain bot user agents get blocked by many news sites
export const BROWSER_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Referer: 'https://www.google.com/',
});

export const isHtmlContentType = (contentType: string): boolean =>
  contentType.startsWith('text/html') || contentType.startsWith('application/xhtml+xml');
