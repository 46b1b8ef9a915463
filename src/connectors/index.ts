import { UnsupportedPlatformError } from "../core/errors";
import { isPlatform, Platform } from "../types/jobs";
import { PlatformAdapter } from "../types/platform";
import { createLinkedInAdapter } from "./linkedin/linkedinConnector";
import { createUpworkAdapter } from "./upwork/upworkConnector";
import { AdapterDeps } from "./types";

export class AdapterRegistry {
  private adapters = new Map<Platform, PlatformAdapter>();

  register(adapter: PlatformAdapter): void {
    this.adapters.set(adapter.platform, adapter);
  }

  get(platform: string): PlatformAdapter {
    const adapter = isPlatform(platform) ? this.adapters.get(platform) : undefined;
    if (adapter) {
      return adapter;
    }
    throw new UnsupportedPlatformError(platform, this.list());
  }

  isSupported(platform: string): boolean {
    return isPlatform(platform) && this.adapters.has(platform);
  }

  list(): Platform[] {
    return Array.from(this.adapters.keys());
  }

  async closeAll(): Promise<void> {
    for (const adapter of this.adapters.values()) {
      await adapter.close();
    }
  }
}

export function createAdapterRegistry(deps: AdapterDeps): AdapterRegistry {
  const registry = new AdapterRegistry();
  registry.register(createLinkedInAdapter(deps));
  registry.register(createUpworkAdapter(deps));
  return registry;
}
