import { Result } from 'neverthrow';

const safePathname = Result.fromThrowable(
  (url: string) => new URL(url).pathname,
  () => 'unparseable'
);

const DOWNLOAD_EXTENSIONS = new Set([
  '.pdf',
  '.zip',
  '.exe',
  '.doc',
  '.docx',
  '.xls',
  '.xlsx',
  '.ppt',
  '.pptx',
]);

/**
 * Collapses every run of whitespace (line breaks included) into a single space.
 */
export const collapseWhitespace = (input: string): string => input.replace(/\s+/g, ' ').trim();

/**
 * Cuts to at most `maxLength` UTF-16 units without splitting a surrogate pair.
 */
export const truncateText = (input: string, maxLength: number): string => {
  if (input.length <= maxLength) return input;

  const lastUnit = input.charCodeAt(maxLength - 1);
  const splitsPair = lastUnit >= 0xd800 && lastUnit <= 0xdbff;
  return input.slice(0, splitsPair ? maxLength - 1 : maxLength);
};

/**
 * True when the URL path names a file download rather than a page.
 * Falls back to the raw string when the URL does not parse.
 */
export const isDownloadLink = (url: string): boolean => {
  const path = safePathname(url).unwrapOr(url.split(/[?#]/)[0] ?? url);

  const lower = path.toLowerCase();
  const dot = lower.lastIndexOf('.');
  if (dot === -1 || dot < lower.lastIndexOf('/')) return false;
  return DOWNLOAD_EXTENSIONS.has(lower.slice(dot));
};
