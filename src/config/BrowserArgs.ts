/**
 * Browser launch arguments
 *
 * SOLID:
 * - SRP: Chromium flag sets only
 * - OCP: categories combine into presets
 */

export const BROWSER_ARGS = {
  /**
   * Memory footprint
   * - minimal /dev/shm use
   * - no GPU, extensions or background networking
   */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage",
    "--disable-gpu",
    "--disable-software-rasterizer",
    "--disable-extensions",
    "--disable-background-networking",
    "--disable-background-timer-throttling",
    "--disable-renderer-backgrounding",
    "--disable-backgrounding-occluded-windows",
    "--disable-default-apps",
    "--no-first-run",
  ],

  /** Hides the automation-controlled marker */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /** Required inside containers */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  /** Container preset */
  get DEFAULT(): string[] {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },

  /** Local development preset (keeps the sandbox) */
  get LOCAL_DEV(): string[] {
    return [...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },
} as const;
