/**
 * Browser session pool
 *
 * Object Pool Pattern over engines (browser processes) and their contexts
 *
 * SOLID:
 * - SRP: lease bookkeeping only; browser calls go through SessionDriver
 * - DIP: depends on SessionDriver, implements ISessionPool
 *
 * Core behaviour:
 * - pre-warms N engines with M contexts each
 * - a FIFO semaphore bounds concurrent leases; excess acquirers wait
 * - allocation order: idle context, new context on an engine with room,
 *   new engine (up to maxEngines), extra context on the least-loaded engine
 * - the mutex guards bookkeeping and is never held across browser I/O
 * - a missing browser binary triggers one install per process, then one retry
 */

import {
  E_CANCELED,
  Mutex,
  Semaphore,
  SemaphoreInterface,
  withTimeout,
} from "async-mutex";
import { SERVICE_NAMES } from "@/config/constants";
import type { Logger } from "@/config/logger";
import type { SessionDriver } from "@/core/interfaces/ISessionDriver";
import type {
  ISessionPool,
  PoolStats,
  SessionHandle,
} from "@/core/interfaces/ISessionPool";
import {
  PoolStartupError,
  PoolTimeoutError,
  PoolUnavailableError,
} from "@/core/errors/AcquisitionErrors";
import { createServiceLogger, errorMessage } from "@/utils/LoggerContext";

export interface BrowserPoolOptions {
  /** Engines launched by initialize() */
  engines: number;
  /** Contexts pre-warmed per engine, also the per-engine soft capacity */
  contextsPerEngine: number;
  /** Ceiling on engines, including on-demand launches */
  maxEngines: number;
  /** Concurrent lease bound (defaults to engines * contextsPerEngine) */
  maxSessions?: number;
  /** 0 or undefined waits indefinitely */
  acquireTimeoutMs?: number;
  /** Attempt a one-time binary install when the engine is missing */
  autoInstall?: boolean;
}

interface PooledEngine<TEngine> {
  id: number;
  engine: TEngine;
  /** Live contexts on this engine, idle and leased */
  contextCount: number;
}

interface PooledContext<TEngine, TContext> {
  owner: PooledEngine<TEngine>;
  context: TContext;
}

interface Lease<TEngine, TContext, TPage> {
  handle: SessionHandle<TPage>;
  pooled: PooledContext<TEngine, TContext>;
  releaseSlot: () => void;
}

type AllocationPlan<TEngine, TContext> =
  | { type: "reuse"; pooled: PooledContext<TEngine, TContext> }
  | { type: "context"; owner: PooledEngine<TEngine> }
  | { type: "engine"; launch: Promise<PooledEngine<TEngine>> }
  | { type: "wait"; until: Promise<unknown> };

export class BrowserPool<TEngine, TContext, TPage>
  implements ISessionPool<TPage>
{
  /** Shared by every pool in the process so the install runs once */
  private static installation: Promise<void> | null = null;

  private readonly logger: Logger;
  private readonly mutex = new Mutex();
  private readonly slots: SemaphoreInterface;
  private readonly maxSessions: number;
  private readonly idleCapacity: number;
  private readonly maxEngines: number;

  private engines: PooledEngine<TEngine>[] = [];
  private idle: PooledContext<TEngine, TContext>[] = [];
  private readonly leases = new Map<number, Lease<TEngine, TContext, TPage>>();
  private readonly launching = new Set<Promise<PooledEngine<TEngine>>>();
  /** On-demand context creations not yet handed to a lease */
  private readonly creating = new Set<Promise<PooledContext<TEngine, TContext>>>();

  private nextEngineId = 1;
  private nextLeaseId = 1;
  private createdCount = 0;
  private reusedCount = 0;
  private prewarmedCount = 0;
  private initialization: Promise<void> | null = null;
  private initialized = false;
  private closed = false;

  constructor(
    private readonly driver: SessionDriver<TEngine, TContext, TPage>,
    private readonly options: BrowserPoolOptions,
    parentLogger?: Logger,
  ) {
    this.logger = createServiceLogger(SERVICE_NAMES.BROWSER_POOL, parentLogger);
    this.idleCapacity = Math.max(
      1,
      options.engines * options.contextsPerEngine,
    );
    this.maxSessions = Math.max(1, options.maxSessions || this.idleCapacity);
    this.maxEngines = Math.max(1, options.maxEngines, options.engines);

    const semaphore = new Semaphore(this.maxSessions);
    this.slots =
      options.acquireTimeoutMs && options.acquireTimeoutMs > 0
        ? withTimeout(
            semaphore,
            options.acquireTimeoutMs,
            new PoolTimeoutError(options.acquireTimeoutMs),
          )
        : semaphore;
  }

  /**
   * Forget the process-wide install attempt (tests)
   */
  public static resetInstallState(): void {
    BrowserPool.installation = null;
  }

  /**
   * Launch and pre-warm engines
   *
   * Partial failure is tolerated; the pool fails only when no engine starts.
   */
  public async initialize(): Promise<void> {
    if (this.closed) {
      throw new PoolUnavailableError("Browser pool has been shut down");
    }
    if (!this.initialization) {
      this.initialization = this.prewarm().catch((error: unknown) => {
        this.initialization = null;
        throw error;
      });
    }
    return this.initialization;
  }

  public async acquire(): Promise<SessionHandle<TPage>> {
    if (this.closed) {
      throw new PoolUnavailableError("Browser pool has been shut down");
    }
    await this.initialize();

    const releaseSlot = await this.acquireSlot();

    try {
      const pooled = await this.leaseContext();
      let page: TPage;
      try {
        page = await this.driver.openPage(pooled.context);
      } catch (error) {
        await this.discardContext(pooled);
        throw error;
      }

      const handle: SessionHandle<TPage> = { id: this.nextLeaseId++, page };
      this.leases.set(handle.id, { handle, pooled, releaseSlot });
      this.logger.debug(
        { leaseId: handle.id, inUse: this.leases.size, available: this.idle.length },
        "Session acquired",
      );
      return handle;
    } catch (error) {
      releaseSlot();
      throw error;
    }
  }

  /**
   * Return a lease
   *
   * Unknown or already released handles are logged and ignored, so a
   * double release never frees a second slot.
   */
  public async release(handle: SessionHandle<TPage>): Promise<void> {
    const lease = this.leases.get(handle.id);
    if (!lease || lease.handle !== handle) {
      this.logger.warn({ leaseId: handle.id }, "Release of unknown or already released session ignored");
      return;
    }
    this.leases.delete(handle.id);

    try {
      try {
        await this.driver.closePage(handle.page);
      } catch (error) {
        this.logger.warn({ leaseId: handle.id, error: errorMessage(error) }, "Page close failed");
      }

      const keep = await this.mutex.runExclusive(() => {
        const reusable =
          !this.closed &&
          this.engines.includes(lease.pooled.owner) &&
          this.driver.isEngineAlive(lease.pooled.owner.engine) &&
          this.idle.length < this.idleCapacity;
        if (reusable) {
          this.idle.push(lease.pooled);
        }
        return reusable;
      });

      if (!keep) {
        await this.discardContext(lease.pooled);
      }

      this.logger.debug(
        { leaseId: handle.id, returnedToPool: keep, available: this.idle.length },
        "Session released",
      );
    } finally {
      lease.releaseSlot();
    }
  }

  public async withSession<T>(fn: (page: TPage) => Promise<T>): Promise<T> {
    const handle = await this.acquire();
    try {
      return await fn(handle.page);
    } finally {
      await this.release(handle);
    }
  }

  public stats(): PoolStats {
    return {
      inUse: this.leases.size,
      available: this.idle.length,
      created: this.createdCount,
      reused: this.reusedCount,
      prewarmed: this.prewarmedCount,
      engines: this.engines.length,
      maxSessions: this.maxSessions,
      initialized: this.initialized,
    };
  }

  /**
   * Close every context, then every engine
   * Individual close failures are logged and skipped.
   */
  public async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.slots.cancel();

    this.logger.info(
      { engines: this.engines.length, idle: this.idle.length, inUse: this.leases.size },
      "Browser pool shutting down",
    );

    await Promise.allSettled([...this.launching]);
    await Promise.allSettled([...this.creating]);

    const contexts = [
      ...this.idle,
      ...[...this.leases.values()].map((lease) => lease.pooled),
    ];
    for (const lease of this.leases.values()) {
      lease.releaseSlot();
    }
    this.leases.clear();
    this.idle = [];

    for (const pooled of contexts) {
      try {
        await this.driver.closeContext(pooled.context);
      } catch (error) {
        this.logger.warn({ error: errorMessage(error) }, "Context close failed during shutdown");
      }
    }

    const engines = this.engines;
    this.engines = [];
    for (const pooled of engines) {
      try {
        await this.driver.closeEngine(pooled.engine);
      } catch (error) {
        this.logger.warn(
          { engineId: pooled.id, error: errorMessage(error) },
          "Engine close failed during shutdown",
        );
      }
    }

    this.initialized = false;
    this.logger.info("Browser pool shut down");
  }

  private async acquireSlot(): Promise<() => void> {
    try {
      const [, releaseSlot] = await this.slots.acquire();
      return releaseSlot;
    } catch (error) {
      if (error === E_CANCELED) {
        throw new PoolUnavailableError("Browser pool is shutting down");
      }
      throw error;
    }
  }

  private async prewarm(): Promise<void> {
    const startTime = Date.now();
    this.logger.info(
      {
        engines: this.options.engines,
        contextsPerEngine: this.options.contextsPerEngine,
        maxSessions: this.maxSessions,
      },
      "Browser pool initializing",
    );

    const results = await Promise.allSettled(
      Array.from({ length: Math.max(1, this.options.engines) }, () =>
        this.prewarmEngine(),
      ),
    );

    const failures = results.filter(
      (result): result is PromiseRejectedResult => result.status === "rejected",
    );
    if (failures.length === results.length) {
      const first: unknown = failures[0]?.reason;
      throw first instanceof PoolStartupError
        ? first
        : new PoolStartupError(`Browser pool failed to start: ${errorMessage(first)}`, {
            cause: first,
          });
    }
    if (failures.length > 0) {
      this.logger.warn(
        { failed: failures.length, errors: failures.map((f) => errorMessage(f.reason)) },
        "Some engines failed to start",
      );
    }

    this.initialized = true;
    this.logger.info(
      { engines: this.engines.length, idle: this.idle.length, elapsedMs: Date.now() - startTime },
      "Browser pool initialized",
    );
  }

  private async prewarmEngine(): Promise<void> {
    const engine = await this.launchEngineWithRemediation();
    const pooledEngine: PooledEngine<TEngine> = {
      id: this.nextEngineId++,
      engine,
      contextCount: 0,
    };
    this.engines.push(pooledEngine);

    for (let i = 0; i < this.options.contextsPerEngine; i++) {
      try {
        const context = await this.driver.createContext(engine);
        pooledEngine.contextCount++;
        this.prewarmedCount++;
        this.idle.push({ owner: pooledEngine, context });
      } catch (error) {
        this.logger.warn(
          { engineId: pooledEngine.id, error: errorMessage(error) },
          "Context pre-warm failed",
        );
      }
    }
  }

  private async leaseContext(): Promise<PooledContext<TEngine, TContext>> {
    for (;;) {
      const plan = await this.mutex.runExclusive(() => this.planAllocation());

      switch (plan.type) {
        case "reuse":
          this.reusedCount++;
          return plan.pooled;

        case "context":
          return this.createOnDemand(plan.owner);

        case "engine":
          return this.createOnDemand(await plan.launch);

        case "wait":
          await Promise.allSettled([plan.until]);
          if (this.closed) {
            throw new PoolUnavailableError("Browser pool has been shut down");
          }
          break;
      }
    }
  }

  /**
   * Runs under the mutex; synchronous so no I/O happens while it is held.
   * Slots for new contexts and engines are reserved here.
   */
  private planAllocation(): AllocationPlan<TEngine, TContext> {
    this.pruneDeadEngines();

    const reusable = this.idle.shift();
    if (reusable) {
      return { type: "reuse", pooled: reusable };
    }

    const withRoom = this.leastLoaded(
      this.engines.filter((e) => e.contextCount < this.options.contextsPerEngine),
    );
    if (withRoom) {
      withRoom.contextCount++;
      return { type: "context", owner: withRoom };
    }

    if (this.engines.length + this.launching.size < this.maxEngines) {
      const launch = this.launchOnDemand();
      this.launching.add(launch);
      const settle = (): void => {
        this.launching.delete(launch);
      };
      launch.then(settle, settle);
      return { type: "engine", launch };
    }

    const leastLoaded = this.leastLoaded(this.engines);
    if (leastLoaded) {
      leastLoaded.contextCount++;
      return { type: "context", owner: leastLoaded };
    }

    return { type: "wait", until: Promise.race([...this.launching]) };
  }

  private async launchOnDemand(): Promise<PooledEngine<TEngine>> {
    const engine = await this.launchEngineWithRemediation();
    const pooled: PooledEngine<TEngine> = {
      id: this.nextEngineId++,
      engine,
      contextCount: 1,
    };
    this.engines.push(pooled);
    this.logger.info({ engineId: pooled.id, engines: this.engines.length }, "Engine launched on demand");
    return pooled;
  }

  private leastLoaded(
    candidates: PooledEngine<TEngine>[],
  ): PooledEngine<TEngine> | undefined {
    return candidates.reduce<PooledEngine<TEngine> | undefined>(
      (best, current) =>
        best === undefined || current.contextCount < best.contextCount
          ? current
          : best,
      undefined,
    );
  }

  /**
   * Drop engines that disconnected along with their idle contexts.
   * Replacements are created lazily by later allocations.
   */
  private pruneDeadEngines(): void {
    const dead = this.engines.filter((e) => !this.driver.isEngineAlive(e.engine));
    if (dead.length === 0) return;

    this.engines = this.engines.filter((e) => !dead.includes(e));
    this.idle = this.idle.filter((pooled) => !dead.includes(pooled.owner));
    this.logger.warn(
      { engineIds: dead.map((e) => e.id), engines: this.engines.length },
      "Disconnected engines dropped from pool",
    );
  }

  /**
   * New context on a reserved engine slot. Shutdown waits for these; a
   * context that arrives after shutdown started is closed here.
   */
  private createOnDemand(
    owner: PooledEngine<TEngine>,
  ): Promise<PooledContext<TEngine, TContext>> {
    const creation = this.openOnDemandContext(owner);
    this.creating.add(creation);
    const settle = (): void => {
      this.creating.delete(creation);
    };
    creation.then(settle, settle);
    return creation;
  }

  private async openOnDemandContext(
    owner: PooledEngine<TEngine>,
  ): Promise<PooledContext<TEngine, TContext>> {
    if (this.closed) {
      owner.contextCount = Math.max(0, owner.contextCount - 1);
      throw new PoolUnavailableError("Browser pool has been shut down");
    }

    let context: TContext;
    try {
      context = await this.driver.createContext(owner.engine);
    } catch (error) {
      owner.contextCount = Math.max(0, owner.contextCount - 1);
      throw error;
    }

    const pooled: PooledContext<TEngine, TContext> = { owner, context };
    if (this.closed) {
      await this.discardContext(pooled);
      throw new PoolUnavailableError("Browser pool has been shut down");
    }
    this.createdCount++;
    return pooled;
  }

  private async discardContext(pooled: PooledContext<TEngine, TContext>): Promise<void> {
    pooled.owner.contextCount = Math.max(0, pooled.owner.contextCount - 1);
    try {
      await this.driver.closeContext(pooled.context);
    } catch (error) {
      this.logger.warn({ engineId: pooled.owner.id, error: errorMessage(error) }, "Context close failed");
    }
  }

  private async launchEngineWithRemediation(): Promise<TEngine> {
    try {
      return await this.driver.launchEngine();
    } catch (error) {
      if (!this.driver.isMissingBinaryError(error) || this.options.autoInstall === false) {
        throw new PoolStartupError(`Engine launch failed: ${errorMessage(error)}`, { cause: error });
      }
    }

    const firstAttempt = BrowserPool.installation === null;
    if (firstAttempt) {
      this.logger.warn("Browser binary missing; installing once");
      BrowserPool.installation = this.driver.installBinary();
    }

    try {
      await BrowserPool.installation;
    } catch (error) {
      throw new PoolStartupError(`Browser install failed: ${errorMessage(error)}`, { cause: error });
    }

    try {
      return await this.driver.launchEngine();
    } catch (error) {
      throw new PoolStartupError(
        `Engine launch failed after install: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
