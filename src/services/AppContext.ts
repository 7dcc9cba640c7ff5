/**
 * Composition root
 *
 * Builds every long-lived service once. Routes receive this object rather
 * than reaching for singletons, so tests can assemble one from fakes.
 */

import { CACHE_CONFIG, POOL_CONFIG, SERVICE_NAMES } from "@/config/constants";
import { ConfigLoader } from "@/config/ConfigLoader";
import { logger as rootLogger, Logger } from "@/config/logger";
import { PLATFORM_IDS } from "@/core/domain/PlatformId";
import type { IAnalyticsSink } from "@/core/interfaces/IAnalyticsSink";
import type { ICacheStore } from "@/core/interfaces/ICacheStore";
import type { BrowserPage } from "@/core/interfaces/IPlatformScraper";
import type { ISellerTrustEvaluator } from "@/core/interfaces/ISellerTrustEvaluator";
import type { ISessionPool } from "@/core/interfaces/ISessionPool";
import { BrowserPool } from "@/scanners/base/BrowserPool";
import { PlaywrightSessionDriver } from "@/scanners/base/PlaywrightSessionDriver";
import { ScraperRegistry } from "@/scrapers/ScraperRegistry";
import { HtmlFetcher } from "@/scrapers/http/HtmlFetcher";
import { EbayScraper } from "@/scrapers/platforms/ebay/EbayScraper";
import { GrailedScraper } from "@/scrapers/platforms/grailed/GrailedScraper";
import { AcquisitionOrchestrator } from "@/services/AcquisitionOrchestrator";
import { LoggerAnalyticsSink } from "@/services/analytics/LoggerAnalyticsSink";
import { CacheBackend, RedisCacheBackend } from "@/services/cache/CacheBackend";
import { RedisCacheStore } from "@/services/cache/RedisCacheStore";
import { CurrencyRateService } from "@/services/CurrencyRateService";
import { SellerAdvisoryService } from "@/services/SellerAdvisoryService";
import { createServiceLogger, errorMessage, logImportant } from "@/utils/LoggerContext";

export interface AppContext {
  logger: Logger;
  registry: ScraperRegistry;
  cache: ICacheStore;
  pool: ISessionPool<BrowserPage>;
  orchestrator: AcquisitionOrchestrator<BrowserPage>;
  currency: CurrencyRateService;
  advisory: ISellerTrustEvaluator;
  shutdown(): Promise<void>;
}

export interface AppContextOverrides {
  logger?: Logger;
  /** null disables caching */
  cacheBackend?: CacheBackend | null;
  pool?: ISessionPool<BrowserPage>;
  fetcher?: Pick<HtmlFetcher, "fetchHtml">;
  /** Fetcher for the rate feed; defaults to `fetcher` when that is given */
  rateFetcher?: Pick<HtmlFetcher, "fetchHtml">;
  analytics?: IAnalyticsSink;
  configDir?: string;
  maxConcurrentUrls?: number;
}

export function createAppContext(overrides: AppContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? rootLogger;

  const configLoader = new ConfigLoader(overrides.configDir);
  const registry = new ScraperRegistry([
    new EbayScraper(configLoader.loadConfig(PLATFORM_IDS.EBAY)),
    new GrailedScraper(configLoader.loadConfig(PLATFORM_IDS.GRAILED)),
  ]);

  const backend =
    overrides.cacheBackend !== undefined
      ? overrides.cacheBackend
      : CACHE_CONFIG.ENABLED
        ? RedisCacheBackend.fromConfig(createServiceLogger(SERVICE_NAMES.CACHE, logger))
        : null;
  const cache = new RedisCacheStore(backend, {}, logger);

  const pool =
    overrides.pool ??
    new BrowserPool(
      new PlaywrightSessionDriver(createServiceLogger(SERVICE_NAMES.BROWSER_POOL, logger)),
      {
        engines: POOL_CONFIG.ENGINES,
        contextsPerEngine: POOL_CONFIG.CONTEXTS_PER_ENGINE,
        maxEngines: POOL_CONFIG.MAX_ENGINES,
        maxSessions: POOL_CONFIG.MAX_SESSIONS || undefined,
        acquireTimeoutMs: POOL_CONFIG.ACQUIRE_TIMEOUT_MS || undefined,
        autoInstall: POOL_CONFIG.AUTO_INSTALL,
      },
      logger,
    );

  const orchestrator = new AcquisitionOrchestrator<BrowserPage>(
    {
      registry,
      cache,
      pool,
      fetcher: overrides.fetcher ?? new HtmlFetcher(),
      analytics: overrides.analytics ?? new LoggerAnalyticsSink(logger),
    },
    { maxConcurrentUrls: overrides.maxConcurrentUrls },
    logger,
  );

  const currency = new CurrencyRateService(
    cache,
    { fetcher: overrides.rateFetcher ?? overrides.fetcher },
    logger,
  );

  const shutdown = async (): Promise<void> => {
    orchestrator.shutdown();
    try {
      await pool.shutdown();
    } catch (error) {
      logger.error({ error: errorMessage(error) }, "Browser pool shutdown failed");
    }
    await cache.close();
    logImportant(logger, "Services stopped");
  };

  return {
    logger,
    registry,
    cache,
    pool,
    orchestrator,
    currency,
    advisory: new SellerAdvisoryService(),
    shutdown,
  };
}
