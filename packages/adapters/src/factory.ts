import type { Logger } from "@armada/core";
import { UnsupportedAdapterTypeError } from "@armada/errors";
import type { AdapterConfig, AdapterConstructor, GatewayAdapter } from "./types.js";

/**
 * Registry of adapter constructors keyed by gateway type.
 *
 * Registration is expected to finish during startup; lookups after that are
 * read-only. Registering a type twice replaces the earlier constructor.
 */
export class AdapterFactory {
  private readonly constructors: Map<string, AdapterConstructor> = new Map();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "adapter-factory" });
  }

  register(type: string, constructor: AdapterConstructor): void {
    if (this.constructors.has(type)) {
      this.logger.warn({ type }, "Replacing adapter registration");
    }
    this.constructors.set(type, constructor);
  }

  /**
   * @throws UnsupportedAdapterTypeError when nothing is registered for `config.type`
   */
  createAdapter(config: AdapterConfig): GatewayAdapter {
    const constructor = this.constructors.get(config.type);
    if (!constructor) {
      throw new UnsupportedAdapterTypeError(config.type);
    }
    return constructor(config, this.logger);
  }

  has(type: string): boolean {
    return this.constructors.has(type);
  }

  listSupportedTypes(): readonly string[] {
    return [...this.constructors.keys()].sort();
  }
}
