/**
 * Session pool contract
 *
 * SOLID:
 * - ISP: consumers see acquire/release/stats only
 * - DIP: the orchestrator depends on this, not on Playwright
 */

/**
 * A leased page. Must be handed back through `release` exactly once.
 */
export interface SessionHandle<TPage> {
  readonly id: number;
  readonly page: TPage;
}

export interface PoolStats {
  /** Leases currently held */
  inUse: number;
  /** Idle contexts ready for reuse */
  available: number;
  /** Contexts created on demand by acquire */
  created: number;
  /** Leases served from an idle context */
  reused: number;
  /** Contexts created by pre-warming */
  prewarmed: number;
  /** Live engines */
  engines: number;
  maxSessions: number;
  initialized: boolean;
}

export interface ISessionPool<TPage> {
  initialize(): Promise<void>;
  acquire(): Promise<SessionHandle<TPage>>;
  release(handle: SessionHandle<TPage>): Promise<void>;
  /** acquire + release around `fn` */
  withSession<T>(fn: (page: TPage) => Promise<T>): Promise<T>;
  stats(): PoolStats;
  shutdown(): Promise<void>;
}
