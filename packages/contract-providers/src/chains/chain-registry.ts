import { ConfigError, type ContractProviderName, CONTRACT_PROVIDER_NAMES, DomainError } from '@spamcheck/core';
import { err, ok, type Result } from 'neverthrow';

import type { ChainConfig, ChainSupportStatus } from './chain-config.schema.js';

export type ChainRejectionReason = 'chain_disabled' | 'no_enabled_providers' | 'unknown_chain';

export class ChainNotSupportedError extends DomainError {
  readonly code = 'CHAIN_NOT_SUPPORTED';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly reason: ChainRejectionReason,
    chainId: number
  ) {
    super(message, { chainId });
  }
}

/**
 * A chain that passed request validation, with the providers to query in priority order.
 */
export interface ResolvedChain {
  chain: ChainConfig;
  providers: readonly ContractProviderName[];
}

export interface ProviderAvailability {
  /** Providers enabled at the service level */
  enabled: readonly ContractProviderName[];
  /** Query and merge order; providers missing here sort last */
  priority: readonly ContractProviderName[];
}

const ALL_PROVIDERS: ProviderAvailability = {
  enabled: CONTRACT_PROVIDER_NAMES,
  priority: CONTRACT_PROVIDER_NAMES,
};

export function statusMessage(status: ChainSupportStatus): string {
  switch (status) {
    case 'full':
      return 'fully supported';
    case 'partial':
      return 'partially supported - some features may be limited';
    case 'planned':
      return 'not yet implemented';
  }
}

/**
 * Immutable table of chains. Lookups are Map reads with no I/O.
 */
export class ChainRegistry {
  private readonly byId: ReadonlyMap<number, ChainConfig>;
  private readonly byName: ReadonlyMap<string, ChainConfig>;
  private readonly providerOrder: readonly ContractProviderName[];

  private constructor(
    private readonly chains: readonly ChainConfig[],
    byName: Map<string, ChainConfig>,
    availability: ProviderAvailability
  ) {
    this.byId = new Map(chains.map((chain) => [chain.chainId, chain]));
    this.byName = byName;

    const rank = (name: ContractProviderName) => {
      const index = availability.priority.indexOf(name);
      return index === -1 ? Number.MAX_SAFE_INTEGER : index;
    };
    this.providerOrder = availability.enabled
      .filter((name, index, all) => all.indexOf(name) === index)
      .sort((a, b) => rank(a) - rank(b));
  }

  static fromConfig(
    chains: readonly ChainConfig[],
    availability: ProviderAvailability = ALL_PROVIDERS
  ): Result<ChainRegistry, ConfigError> {
    const seenIds = new Set<number>();
    const byName = new Map<string, ChainConfig>();
    const issues: string[] = [];

    for (const chain of chains) {
      if (seenIds.has(chain.chainId)) {
        issues.push(`duplicate chain ID ${chain.chainId}`);
        continue;
      }
      seenIds.add(chain.chainId);

      for (const label of [chain.name, ...chain.aliases]) {
        const key = label.toLowerCase();
        const existing = byName.get(key);
        if (existing && existing.chainId !== chain.chainId) {
          issues.push(`chain name or alias '${label}' is used by chains ${existing.chainId} and ${chain.chainId}`);
          continue;
        }
        byName.set(key, chain);
      }
    }

    if (issues.length > 0) {
      return err(new ConfigError(`Invalid chain registry: ${issues.join('; ')}`, issues));
    }

    return ok(new ChainRegistry(chains, byName, availability));
  }

  /**
   * Resolve an enabled chain. Unknown and disabled chains are distinguished by `reason`.
   */
  resolve(chainId: number): Result<ChainConfig, ChainNotSupportedError> {
    const chain = this.byId.get(chainId);
    if (!chain) {
      return err(
        new ChainNotSupportedError(
          `unsupported chain ID: ${chainId}. Supported chain IDs are: ${this.describeSupported()}`,
          'unknown_chain',
          chainId
        )
      );
    }

    if (!chain.enabled) {
      const detail =
        chain.status === 'planned' ? 'is not yet implemented and is planned for future implementation' : 'is currently disabled';
      return err(
        new ChainNotSupportedError(`Chain ${chain.name} (ID: ${chain.chainId}) ${detail}`, 'chain_disabled', chainId)
      );
    }

    return ok(chain);
  }

  /**
   * Request-boundary check: known, enabled, and at least one provider to ask.
   */
  validateForRequest(chainId: number): Result<ResolvedChain, ChainNotSupportedError> {
    return this.resolve(chainId).andThen((chain) => {
      const providers = this.enabledProvidersFor(chain);
      if (providers.length === 0) {
        return err(
          new ChainNotSupportedError(
            `Chain ${chain.name} (ID: ${chain.chainId}) has no enabled metadata providers`,
            'no_enabled_providers',
            chainId
          )
        );
      }
      return ok({ chain, providers });
    });
  }

  /**
   * Providers enabled both at service level and for this chain, in priority order.
   */
  enabledProvidersFor(chain: ChainConfig): ContractProviderName[] {
    return this.providerOrder.filter((name) => chain.providers[name]?.enabled === true);
  }

  /**
   * Every provider some enabled chain would query, deduplicated, in priority order.
   */
  providersInUse(): ContractProviderName[] {
    const inUse = new Set<ContractProviderName>();
    for (const chain of this.chains) {
      if (!chain.enabled) continue;
      for (const name of this.enabledProvidersFor(chain)) {
        inUse.add(name);
      }
    }
    return this.providerOrder.filter((name) => inUse.has(name));
  }

  /**
   * Find a chain by numeric id, name or alias (case-insensitive).
   */
  lookup(nameOrId: string): ChainConfig | undefined {
    const trimmed = nameOrId.trim();
    if (/^\d+$/.test(trimmed)) {
      return this.byId.get(Number(trimmed));
    }
    return this.byName.get(trimmed.toLowerCase());
  }

  list(): readonly ChainConfig[] {
    return this.chains;
  }

  private describeSupported(): string {
    return this.chains
      .filter((chain) => chain.enabled)
      .map((chain) => `${chain.chainId} (${chain.name})`)
      .join(', ');
  }
}
