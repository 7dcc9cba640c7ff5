/**
 * BrowserPool unit tests (fake driver, no browser)
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import {
  PoolStartupError,
  PoolTimeoutError,
  PoolUnavailableError,
} from "@/core/errors/AcquisitionErrors";
import { BrowserPool, BrowserPoolOptions } from "@/scanners/base/BrowserPool";
import {
  FakeContext,
  FakeEngine,
  FakePage,
  FakeSessionDriver,
} from "../helpers/FakeSessionDriver";
import { deferred, flushAsync, silentLogger } from "../helpers/fakes";

type FakePool = BrowserPool<FakeEngine, FakeContext, FakePage>;

describe("BrowserPool", () => {
  let driver: FakeSessionDriver;
  const pools: FakePool[] = [];

  function createPool(options: Partial<BrowserPoolOptions> = {}, poolDriver = driver): FakePool {
    const pool = new BrowserPool(
      poolDriver,
      { engines: 1, contextsPerEngine: 2, maxEngines: 1, ...options },
      silentLogger,
    );
    pools.push(pool);
    return pool;
  }

  beforeEach(() => {
    BrowserPool.resetInstallState();
    driver = new FakeSessionDriver();
  });

  afterEach(async () => {
    await Promise.all(pools.splice(0).map((pool) => pool.shutdown()));
  });

  describe("initialize", () => {
    it("pre-warms engines and contexts", async () => {
      const pool = createPool();
      await pool.initialize();

      expect(driver.launchCalls).toBe(1);
      expect(pool.stats()).toEqual({
        inUse: 0,
        available: 2,
        created: 0,
        reused: 0,
        prewarmed: 2,
        engines: 1,
        maxSessions: 2,
        initialized: true,
      });
    });

    it("shares one pre-warm between concurrent callers", async () => {
      const pool = createPool();
      await Promise.all([pool.initialize(), pool.initialize()]);

      expect(driver.launchCalls).toBe(1);
    });

    it("fails with PoolStartupError when no engine starts, and retries on the next call", async () => {
      driver.launchFailures = [new Error("crash")];
      const pool = createPool();

      await expect(pool.initialize()).rejects.toThrow("Engine launch failed: crash");
      await expect(pool.initialize()).resolves.toBeUndefined();
      expect(pool.stats().initialized).toBe(true);
    });
  });

  describe("binary remediation", () => {
    it("installs once and retries the launch when the binary is missing", async () => {
      driver.launchFailures = [new Error("Executable doesn't exist at /opt/chromium")];
      const pool = createPool();

      await pool.initialize();

      expect(driver.installCalls).toBe(1);
      expect(driver.launchCalls).toBe(2);
    });

    it("does not install a second time in the same process", async () => {
      driver.launchFailures = [new Error("Executable doesn't exist at /opt/chromium")];
      await createPool().initialize();

      const secondDriver = new FakeSessionDriver();
      secondDriver.launchFailures = [new Error("Executable doesn't exist at /opt/chromium")];
      await createPool({}, secondDriver).initialize();

      expect(driver.installCalls).toBe(1);
      expect(secondDriver.installCalls).toBe(0);
      expect(secondDriver.launchCalls).toBe(2);
    });

    it("skips remediation when auto-install is off", async () => {
      driver.launchFailures = [new Error("Executable doesn't exist at /opt/chromium")];
      const pool = createPool({ autoInstall: false });

      await expect(pool.initialize()).rejects.toBeInstanceOf(PoolStartupError);
      expect(driver.installCalls).toBe(0);
    });

    it("reports a failed install as PoolStartupError", async () => {
      driver.launchFailures = [new Error("Executable doesn't exist at /opt/chromium")];
      driver.installFailure = new Error("no network");
      const pool = createPool();

      await expect(pool.initialize()).rejects.toThrow("Browser install failed: no network");
    });
  });

  describe("acquire / release", () => {
    it("blocks acquirers beyond maxSessions until a lease is released", async () => {
      const pool = createPool();
      const first = await pool.acquire();
      await pool.acquire();

      let thirdGranted = false;
      const third = pool.acquire().then((handle) => {
        thirdGranted = true;
        return handle;
      });
      await flushAsync();
      expect(thirdGranted).toBe(false);

      await pool.release(first);
      await third;
      expect(thirdGranted).toBe(true);
      expect(pool.stats()).toMatchObject({ inUse: 2, reused: 3, created: 0 });
    });

    it("ignores a second release of the same handle", async () => {
      const pool = createPool();
      const first = await pool.acquire();
      await pool.acquire();

      await pool.release(first);
      await pool.release(first);
      expect(pool.stats().inUse).toBe(1);

      await pool.acquire();
      let fourthGranted = false;
      const fourth = pool.acquire().then(() => {
        fourthGranted = true;
      });
      await flushAsync();
      expect(fourthGranted).toBe(false);

      const rejection = expect(fourth).rejects.toBeInstanceOf(PoolUnavailableError);
      await pool.shutdown();
      await rejection;
    });

    it("creates contexts on demand past the pre-warmed set and trims idle ones on release", async () => {
      const pool = createPool({ contextsPerEngine: 1, maxSessions: 3 });
      const handles = [await pool.acquire(), await pool.acquire(), await pool.acquire()];

      expect(pool.stats()).toMatchObject({ inUse: 3, reused: 1, created: 2, prewarmed: 1 });

      for (const handle of handles) {
        await pool.release(handle);
      }
      expect(pool.stats()).toMatchObject({ inUse: 0, available: 1 });
      expect(driver.openContexts()).toHaveLength(1);
    });

    it("launches another engine on demand up to maxEngines", async () => {
      const pool = createPool({ contextsPerEngine: 1, maxEngines: 2, maxSessions: 2 });
      await pool.acquire();
      await pool.acquire();

      expect(driver.launchCalls).toBe(2);
      expect(pool.stats()).toMatchObject({ engines: 2, created: 1 });
    });

    it("closes the page on release and keeps the context", async () => {
      const pool = createPool();
      const handle = await pool.acquire();

      await pool.release(handle);

      expect(handle.page.closed).toBe(true);
      expect(driver.openContexts()).toHaveLength(2);
      expect(pool.stats().available).toBe(2);
    });

    it("replaces a disconnected engine", async () => {
      const pool = createPool({ contextsPerEngine: 1, maxSessions: 1 });
      const first = await pool.acquire();
      await pool.release(first);
      driver.engines[0].alive = false;

      const second = await pool.acquire();

      expect(driver.launchCalls).toBe(2);
      expect(pool.stats().engines).toBe(1);
      const context = driver.contexts.find((c) => c.id === second.page.contextId);
      expect(context?.engineId).toBe(driver.engines[1].id);
    });

    it("frees the slot when opening a page fails", async () => {
      const pool = createPool({ maxSessions: 1 });
      await pool.initialize();
      driver.openPageFailure = new Error("target closed");

      await expect(pool.acquire()).rejects.toThrow("target closed");
      expect(pool.stats().inUse).toBe(0);
      await expect(pool.acquire()).resolves.toMatchObject({ id: expect.any(Number) });
    });

    it("times out waiting acquirers when an acquire timeout is set", async () => {
      const pool = createPool({ maxSessions: 1, acquireTimeoutMs: 20 });
      await pool.acquire();

      await expect(pool.acquire()).rejects.toBeInstanceOf(PoolTimeoutError);
    });
  });

  describe("withSession", () => {
    it("releases the lease when the callback throws", async () => {
      const pool = createPool();

      await expect(
        pool.withSession(async () => {
          throw new Error("selector missing");
        }),
      ).rejects.toThrow("selector missing");
      expect(pool.stats().inUse).toBe(0);
    });
  });

  describe("shutdown", () => {
    it("closes contexts before engines and refuses later acquires", async () => {
      const pool = createPool();
      const handle = await pool.acquire();

      await pool.shutdown();

      const leasedContext = handle.page.contextId;
      const idleContext = driver.contexts.find((c) => c.id !== leasedContext);
      expect(driver.closeLog).toEqual([
        `context:${idleContext?.id}`,
        `context:${leasedContext}`,
        `engine:${driver.engines[0].id}`,
      ]);
      await expect(pool.acquire()).rejects.toBeInstanceOf(PoolUnavailableError);
      await expect(pool.release(handle)).resolves.toBeUndefined();
    });

    it("waits for an on-demand context and closes it before the engines", async () => {
      const pool = createPool({ contextsPerEngine: 1, maxSessions: 2 });
      await pool.acquire();
      const gate = deferred<void>();
      driver.contextGate = gate.promise;

      const late = pool.acquire();
      await flushAsync();
      const stopping = pool.shutdown();
      gate.resolve();

      await expect(late).rejects.toBeInstanceOf(PoolUnavailableError);
      await stopping;
      const lateContext = driver.contexts[driver.contexts.length - 1];
      expect(lateContext.closed).toBe(true);
      expect(driver.openContexts()).toEqual([]);
      expect(driver.closeLog[driver.closeLog.length - 1]).toBe(`engine:${driver.engines[0].id}`);
      expect(driver.closeLog.indexOf(`context:${lateContext.id}`)).toBeLessThan(
        driver.closeLog.indexOf(`engine:${driver.engines[0].id}`),
      );
      expect(pool.stats().created).toBe(0);
    });
  });
});
