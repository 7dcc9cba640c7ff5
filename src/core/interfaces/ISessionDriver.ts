/**
 * Browser driver seam used by the session pool
 *
 * The pool owns bookkeeping; the driver owns every call into the browser
 * library, including the network blocking policy applied to new contexts.
 */
export interface SessionDriver<TEngine, TContext, TPage> {
  launchEngine(): Promise<TEngine>;
  /** Creates a context with resource blocking already installed */
  createContext(engine: TEngine): Promise<TContext>;
  openPage(context: TContext): Promise<TPage>;
  closePage(page: TPage): Promise<void>;
  closeContext(context: TContext): Promise<void>;
  closeEngine(engine: TEngine): Promise<void>;
  isEngineAlive(engine: TEngine): boolean;
  /** True when a launch failed because the browser binary is not installed */
  isMissingBinaryError(error: unknown): boolean;
  installBinary(): Promise<void>;
}
