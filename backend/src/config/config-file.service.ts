import { access, readFile } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import { resolve } from "node:path";
import { Injectable, Logger } from "@nestjs/common";
import YAML from "yaml";

import type { ConfigDocument } from "./schemas";
import { parseConfigDocument } from "./schemas";

const DEFAULT_CONFIG_FILE = "../config.local.yaml";
export const CONFIG_PATH_ENV = "TARIFF_MONITOR_CONFIG";

@Injectable()
export class ConfigFileService {
  private readonly logger = new Logger(ConfigFileService.name);

  resolvePath(): string {
    const override = process.env[CONFIG_PATH_ENV];
    if (override && override.trim().length > 0) {
      return resolve(process.cwd(), override.trim());
    }
    return resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  }

  isOverridden(): boolean {
    return (process.env[CONFIG_PATH_ENV]?.trim().length ?? 0) > 0;
  }

  async loadDocument(path: string): Promise<ConfigDocument> {
    try {
      await access(path, fsConstants.R_OK);
    } catch (error) {
      // Only an explicitly configured path is mandatory; otherwise run on defaults.
      if (this.isOverridden()) {
        throw new Error(`Config file ${path} is not readable`, {cause: error});
      }
      this.logger.warn(`Config file ${path} not found; using built-in defaults`);
      return parseConfigDocument({});
    }
    const rawContent = await readFile(path, "utf-8");
    const parsed: unknown = YAML.parse(rawContent);
    this.logger.verbose(`Loaded configuration from ${path}`);
    return parseConfigDocument(parsed);
  }
}
