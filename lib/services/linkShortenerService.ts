// LINK SHORTENER - Shortening boundary used to squeeze long URLs into a Micro QR code
// A single attempt per URL, bounded by a timeout. Callers decide how to degrade.

import { AppError, ErrorCodes } from '@/lib/utils/errors';
import { URL_SCHEME_PREFIXES } from '@/lib/constants/label';
import { silentLogger, type Logger } from '@/lib/utils/logger';
import type { SpreadsheetTable } from './spreadsheetService';

export interface LinkShortener {
  /**
   * Return a shorter URL for the same target.
   * Rejects with SHORTENING_UNAVAILABLE on any network or service failure.
   */
  shorten(url: string): Promise<string>;
}

export interface VgdLinkShortenerOptions {
  /** Endpoint prefix; the encoded URL is appended */
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export function isUrlShaped(value: string): boolean {
  return URL_SCHEME_PREFIXES.some((prefix) => value.startsWith(prefix));
}

export function stripUrlScheme(value: string): string {
  for (const prefix of URL_SCHEME_PREFIXES) {
    if (value.startsWith(prefix)) {
      return value.slice(prefix.length);
    }
  }
  return value;
}

/**
 * v.gd "simple" API: GET create.php?format=simple&url=... answers with the short URL as plain text
 */
export class VgdLinkShortener implements LinkShortener {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: VgdLinkShortenerOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'https://v.gd/create.php?format=simple&url=';
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async shorten(url: string): Promise<string> {
    let status: number;
    let body: string;
    try {
      const response = await this.fetchImpl(this.baseUrl + encodeURIComponent(url), {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      body = await response.text();
    } catch (error) {
      throw new AppError(
        ErrorCodes.SHORTENING_UNAVAILABLE,
        `URL shortening failed for ${url}: ${error instanceof Error ? error.message : String(error)}`,
        { url }
      );
    }

    if (status < 200 || status >= 300) {
      throw new AppError(
        ErrorCodes.SHORTENING_UNAVAILABLE,
        `URL shortening failed for ${url}: HTTP ${status}`,
        { url, status }
      );
    }

    const shortUrl = body.trim();
    // v.gd reports errors as plain text with a 200 status
    if (!isUrlShaped(shortUrl)) {
      throw new AppError(ErrorCodes.SHORTENING_UNAVAILABLE, `URL shortening failed for ${url}: ${shortUrl}`, {
        url,
      });
    }

    return shortUrl;
  }
}

// ========================================
// SHORT URL COLUMN
// ========================================

export const SHORT_URL_COLUMN = 'short_url';

export interface ShortUrlColumnResult {
  table: SpreadsheetTable;
  shortened: number;
  /** Rows without a URL, plus rows whose URL could not be shortened */
  skipped: number;
}

/**
 * Shorten every row's reorder_url into a short_url column, leaving the other cells untouched.
 * A failed row gets an empty short_url.
 */
export async function addShortUrlColumn(
  table: SpreadsheetTable,
  shortener: LinkShortener,
  logger: Logger = silentLogger
): Promise<ShortUrlColumnResult> {
  const columns = table.columns.includes(SHORT_URL_COLUMN) ? table.columns : [...table.columns, SHORT_URL_COLUMN];
  const rows: Record<string, string>[] = [];
  let shortened = 0;
  let skipped = 0;

  for (const row of table.rows) {
    const reorderUrl = (row.reorder_url ?? '').trim();
    let shortUrl = '';

    if (isUrlShaped(reorderUrl)) {
      try {
        shortUrl = await shortener.shorten(reorderUrl);
        logger.debug(`Shortened: ${reorderUrl} -> ${shortUrl}`);
        shortened++;
      } catch (error) {
        logger.error(`Failed to shorten URL '${reorderUrl}': ${error instanceof Error ? error.message : String(error)}`);
        skipped++;
      }
    } else {
      skipped++;
    }

    rows.push({ ...row, [SHORT_URL_COLUMN]: shortUrl });
  }

  return { table: { ...table, columns, rows }, shortened, skipped };
}
