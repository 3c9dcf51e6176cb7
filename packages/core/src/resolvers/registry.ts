import type { EcosystemName } from "@prefetch/types";

import { BundlerResolver } from "./bundler/resolver.js";
import { CargoResolver } from "./cargo/resolver.js";
import { GenericResolver } from "./generic/resolver.js";
import { GomodResolver } from "./gomod/resolver.js";
import { NpmResolver } from "./npm/resolver.js";
import { PipResolver } from "./pip/resolver.js";
import { RpmResolver } from "./rpm/resolver.js";
import type { EcosystemResolver } from "./types.js";
import { YarnResolver } from "./yarn/resolver.js";

export interface ResolverRegistry {
  register(resolver: EcosystemResolver): void;
  get(ecosystem: EcosystemName): EcosystemResolver | undefined;
  has(ecosystem: EcosystemName): boolean;
  list(): EcosystemResolver[];
}

export class ResolverRegistryImpl implements ResolverRegistry {
  private readonly resolvers = new Map<EcosystemName, EcosystemResolver>();

  register(resolver: EcosystemResolver): void {
    if (this.resolvers.has(resolver.ecosystem)) {
      throw new Error(`resolver already registered: ${resolver.ecosystem}`);
    }
    this.resolvers.set(resolver.ecosystem, resolver);
  }

  get(ecosystem: EcosystemName): EcosystemResolver | undefined {
    return this.resolvers.get(ecosystem);
  }

  has(ecosystem: EcosystemName): boolean {
    return this.resolvers.has(ecosystem);
  }

  list(): EcosystemResolver[] {
    return [...this.resolvers.values()];
  }
}

export function createDefaultResolverRegistry(): ResolverRegistry {
  const registry = new ResolverRegistryImpl();
  registry.register(new NpmResolver());
  registry.register(new YarnResolver());
  registry.register(new PipResolver());
  registry.register(new GomodResolver());
  registry.register(new BundlerResolver());
  registry.register(new CargoResolver());
  registry.register(new RpmResolver());
  registry.register(new GenericResolver());
  return registry;
}
