/**
 * YAML platform config loader
 *
 * SOLID:
 * - SRP: loads and validates config/platforms/<platform>.yaml
 * - OCP: selectors change in YAML, not in scraper code
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import type { PlatformId } from "@/core/domain/PlatformId";
import {
  PlatformScraperConfig,
  PlatformScraperConfigSchema,
} from "@/core/domain/PlatformScraperConfig";

export const DEFAULT_PLATFORM_CONFIG_DIR =
  process.env.PLATFORM_CONFIG_DIR ||
  path.join(process.cwd(), "config", "platforms");

export class ConfigLoader {
  private readonly configCache = new Map<PlatformId, PlatformScraperConfig>();

  constructor(private readonly configDir: string = DEFAULT_PLATFORM_CONFIG_DIR) {}

  loadConfig(platform: PlatformId): PlatformScraperConfig {
    const cached = this.configCache.get(platform);
    if (cached) {
      return cached;
    }

    const configPath = path.join(this.configDir, `${platform}.yaml`);
    if (!fs.existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }

    const parsed = PlatformScraperConfigSchema.safeParse(
      yaml.load(fs.readFileSync(configPath, "utf8")),
    );
    if (!parsed.success) {
      throw new Error(
        `Invalid platform config ${configPath}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`,
      );
    }
    if (parsed.data.platform !== platform) {
      throw new Error(
        `Platform mismatch in ${configPath}: expected ${platform}, found ${parsed.data.platform}`,
      );
    }

    this.configCache.set(platform, parsed.data);
    return parsed.data;
  }

  clearCache(): void {
    this.configCache.clear();
  }
}
