import { Injectable } from "@nestjs/common";

import type { ConfigDocument } from "./schemas";
import { getRuntimeConfig } from "./runtime-config";

@Injectable()
export class RuntimeConfigService {
  private readonly document: ConfigDocument;

  constructor() {
    const config = getRuntimeConfig();
    if (!config) {
      throw new Error("Runtime configuration not initialised; call setRuntimeConfig() before creating the app");
    }
    this.document = config;
  }

  getDocumentRef(): ConfigDocument {
    return this.document;
  }
}
