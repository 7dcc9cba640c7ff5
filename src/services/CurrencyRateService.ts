/**
 * Currency rate service
 *
 * Rates come from the central bank's daily XML (roubles per unit of each
 * currency). Lookup order:
 * 1. cache ("rate" namespace)         -> source "cache"
 * 2. daily feed, coalesced per process -> source "cbr"
 * 3. last good rate, up to 24h old     -> source "fallback"
 *
 * Conversions into roubles carry the configured markup (2 decimals);
 * other cross rates are plain (4 decimals).
 */

import * as cheerio from "cheerio";
import { CURRENCY_CONFIG, SERVICE_NAMES } from "@/config/constants";
import type { Logger } from "@/config/logger";
import { ExchangeRate, ratePairKey } from "@/core/domain/ExchangeRate";
import type { ICacheStore } from "@/core/interfaces/ICacheStore";
import { HtmlFetcher } from "@/scrapers/http/HtmlFetcher";
import { RequestCoalescer } from "@/services/RequestCoalescer";
import { createServiceLogger, errorMessage } from "@/utils/LoggerContext";

/** Roubles per one unit of each currency code */
export type RateTable = ReadonlyMap<string, number>;

const DAILY_FEED_KEY = "cbr:daily";

export interface CurrencyRateServiceOptions {
  fetcher?: Pick<HtmlFetcher, "fetchHtml">;
  sourceUrl?: string;
  markupPercent?: number;
  fallbackMaxAgeMs?: number;
  now?: () => Date;
}

/**
 * Parse the daily feed
 *
 * Values use a decimal comma and are quoted per `Nominal` units.
 */
export function parseDailyRates(xml: string): RateTable {
  const $ = cheerio.load(xml, { xml: true });
  const table = new Map<string, number>([[CURRENCY_CONFIG.BASE_CURRENCY, 1]]);

  $("Valute").each((_, element) => {
    const node = $(element);
    const code = node.find("CharCode").first().text().trim().toUpperCase();
    const value = Number(node.find("Value").first().text().trim().replace(",", "."));
    const nominal = Number(node.find("Nominal").first().text().trim() || "1");
    if (!code || !Number.isFinite(value) || value <= 0 || !(nominal > 0)) {
      return;
    }
    table.set(code, value / nominal);
  });

  if (table.size === 1) {
    throw new Error("Daily rate feed contained no currencies");
  }
  return table;
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export class CurrencyRateService {
  private readonly logger: Logger;
  private readonly coalescer: RequestCoalescer<RateTable>;
  private readonly fetcher: Pick<HtmlFetcher, "fetchHtml">;
  private readonly sourceUrl: string;
  private readonly markupPercent: number;
  private readonly fallbackMaxAgeMs: number;
  private readonly now: () => Date;
  private readonly lastKnown = new Map<string, ExchangeRate>();

  constructor(
    private readonly cache: ICacheStore,
    options: CurrencyRateServiceOptions = {},
    parentLogger?: Logger,
  ) {
    this.logger = createServiceLogger(SERVICE_NAMES.CURRENCY, parentLogger);
    this.coalescer = new RequestCoalescer<RateTable>(this.logger);
    this.fetcher =
      options.fetcher ?? new HtmlFetcher({ timeoutMs: CURRENCY_CONFIG.REQUEST_TIMEOUT_MS });
    this.sourceUrl = options.sourceUrl ?? CURRENCY_CONFIG.CBR_DAILY_URL;
    this.markupPercent = options.markupPercent ?? CURRENCY_CONFIG.MARKUP_PERCENT;
    this.fallbackMaxAgeMs = options.fallbackMaxAgeMs ?? CURRENCY_CONFIG.FALLBACK_MAX_AGE_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Rate for a currency pair, or null when neither the feed nor a recent
   * fallback can supply one
   */
  async getRate(from: string, to: string): Promise<ExchangeRate | null> {
    const source = from.toUpperCase();
    const target = to.toUpperCase();
    const pair = ratePairKey(source, target);

    const cached = await this.cache.get("rate", pair);
    if (cached) {
      return { ...cached, source: "cache" };
    }

    let table: RateTable;
    try {
      table = await this.coalescer.getOrFetch(DAILY_FEED_KEY, () => this.fetchDailyRates());
    } catch (error) {
      this.logger.error({ pair, error: errorMessage(error) }, "Rate feed unavailable");
      return this.fallback(pair);
    }

    const rate = this.computeRate(table, source, target);
    if (!rate) {
      this.logger.warn({ pair }, "Currency pair not supported by rate feed");
      return null;
    }

    this.lastKnown.set(pair, rate);
    await this.cache.set("rate", pair, rate);
    this.logger.info({ pair, rate: rate.rate, markup: rate.markupPercentage }, "Rate fetched");
    return rate;
  }

  /**
   * Drop cached rates and the fallback memory
   * @returns cache keys deleted
   */
  async invalidate(): Promise<number> {
    this.lastKnown.clear();
    const deleted = await this.cache.invalidateNamespace("rate");
    this.logger.info({ deleted }, "Rate cache cleared");
    return deleted;
  }

  private async fetchDailyRates(): Promise<RateTable> {
    this.logger.debug({ url: this.sourceUrl }, "Fetching daily rate feed");
    const xml = await this.fetcher.fetchHtml(this.sourceUrl);
    return parseDailyRates(xml);
  }

  private computeRate(table: RateTable, from: string, to: string): ExchangeRate | null {
    const fromRub = table.get(from);
    const toRub = table.get(to);
    if (fromRub === undefined || toRub === undefined) return null;

    const intoBase = to === CURRENCY_CONFIG.BASE_CURRENCY && from !== to;
    const markupPercentage = intoBase ? this.markupPercent : 0;
    const cross = fromRub / toRub;
    const rate = intoBase
      ? roundTo(cross * (1 + markupPercentage / 100), 2)
      : roundTo(cross, 4);

    return {
      from,
      to,
      rate,
      source: "cbr",
      fetchedAt: this.now(),
      markupPercentage,
    };
  }

  private fallback(pair: string): ExchangeRate | null {
    const last = this.lastKnown.get(pair);
    if (!last) return null;
    if (this.now().getTime() - last.fetchedAt.getTime() > this.fallbackMaxAgeMs) {
      this.logger.warn({ pair }, "Last known rate too old for fallback");
      return null;
    }
    this.logger.warn({ pair, fetchedAt: last.fetchedAt }, "Serving last known rate");
    return { ...last, source: "fallback" };
  }
}
