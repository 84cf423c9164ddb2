/**
 * Devnet
 *
 * Several in-process ledgers, each with a stable token, an asset
 * contract, a fixed-rate swap venue, a relay endpoint and a marketplace,
 * all connected through one relay network. Every marketplace trusts every
 * other one as its peer. Used by the HTTP node and the end-to-end tests.
 */

import { Address, ChainId, deriveAddress, FixedRateSwapVenue, InMemoryAssetContract, Ledger } from '../ledger';
import { logger } from '../logging/structured-logger';
import { ConversionPolicy, DEFAULT_CONVERSION_POLICY, Marketplace } from '../marketplace';
import { DeliveryRecord, InMemoryRelayEndpoint, InMemoryRelayNetwork, RelayFeeModel } from '../relay';

export const ONE_NATIVE = 10n ** 18n;
export const ONE_STABLE = 10n ** 6n;

export interface DevnetChainOptions {
  chainId: ChainId;
  name: string;
}

export interface DevnetOptions {
  chains?: DevnetChainOptions[];
  owner?: Address;
  feeBps?: number;
  conversion?: Partial<ConversionPolicy>;
  relayFeeModel?: Partial<RelayFeeModel>;
  bridgeFeeBps?: number;
  /** Stable units paid for one whole native unit before pool fees. */
  stablePerNative?: bigint;
  liquidity?: { native: bigint; stable: bigint };
}

export interface DevnetChain {
  chainId: ChainId;
  name: string;
  ledger: Ledger;
  stableToken: Address;
  assets: InMemoryAssetContract;
  venue: FixedRateSwapVenue;
  endpoint: InMemoryRelayEndpoint;
  marketplace: Marketplace;
}

export const DEFAULT_DEVNET_CHAINS: DevnetChainOptions[] = [
  { chainId: 101, name: 'home' },
  { chainId: 102, name: 'remote' },
];

export class Devnet {
  readonly relay: InMemoryRelayNetwork;
  readonly owner: Address;
  private chains: Map<ChainId, DevnetChain> = new Map();

  private constructor(relay: InMemoryRelayNetwork, owner: Address) {
    this.relay = relay;
    this.owner = owner;
  }

  static create(opts: DevnetOptions = {}): Devnet {
    const chainOptions = opts.chains ?? DEFAULT_DEVNET_CHAINS;
    const owner = (opts.owner ?? deriveAddress('devnet:owner')).toLowerCase();
    const conversion = { ...DEFAULT_CONVERSION_POLICY, ...opts.conversion };
    const stablePerNative = opts.stablePerNative ?? 2_000n * ONE_STABLE;
    const liquidity = opts.liquidity ?? { native: 1_000_000n * ONE_NATIVE, stable: 2_000_000_000n * ONE_STABLE };

    const devnet = new Devnet(
      new InMemoryRelayNetwork({ feeModel: opts.relayFeeModel, bridgeFeeBps: opts.bridgeFeeBps }),
      owner
    );

    const peers: Array<[ChainId, string]> = chainOptions.map(s => [s.chainId, deriveAddress(`${s.name}:marketplace`)]);

    for (const chain of chainOptions) {
      const ledger = new Ledger({ chainId: chain.chainId, name: chain.name });
      const stableToken = deriveAddress(`${chain.name}:stable`);

      const assets = new InMemoryAssetContract(deriveAddress(`${chain.name}:assets`));
      ledger.registerAssetContract(assets);

      const venue = new FixedRateSwapVenue(ledger, deriveAddress(`${chain.name}:venue`));
      venue.addPair(ledger.wrappedNative, stableToken, conversion.poolFee, {
        numerator: stablePerNative,
        denominator: ONE_NATIVE,
      });
      ledger.credit(venue.address, liquidity.native);
      ledger.wrap(venue.address, liquidity.native);
      ledger.mintToken(stableToken, venue.address, liquidity.stable);

      const endpoint = devnet.relay.connect(ledger, {
        address: deriveAddress(`${chain.name}:relay`),
        stableToken,
      });

      const marketplace = new Marketplace({
        ledger,
        owner,
        stableToken,
        swapVenue: venue,
        relay: endpoint,
        feeBps: opts.feeBps,
        conversion,
        approvedAssets: [assets.address],
        trustedPeers: peers.filter(([chainId]) => chainId !== chain.chainId),
      });

      devnet.chains.set(chain.chainId, {
        chainId: chain.chainId,
        name: chain.name,
        ledger,
        stableToken,
        assets,
        venue,
        endpoint,
        marketplace,
      });
    }

    logger.info('Devnet', 'Devnet ready', {
      chains: chainOptions.map(s => `${s.name}(${s.chainId})`).join(', '),
      owner,
    });
    return devnet;
  }

  chain(chainId: ChainId): DevnetChain {
    const chain = this.chains.get(chainId);
    if (!chain) {
      throw new Error(`Devnet has no chain ${chainId}`);
    }
    return chain;
  }

  chainIds(): ChainId[] {
    return Array.from(this.chains.keys());
  }

  /** Faucet: credit native value to an account. */
  async fund(chainId: ChainId, account: Address, amount: bigint): Promise<void> {
    const { ledger } = this.chain(chainId);
    await ledger.execute({ sender: this.owner, to: this.owner, value: 0n }, () => ledger.credit(account, amount));
  }

  async mintAsset(chainId: ChainId, to: Address, assetId: bigint): Promise<void> {
    const { ledger, assets } = this.chain(chainId);
    await ledger.execute({ sender: this.owner, to: assets.address, value: 0n }, () => assets.mint(to, assetId));
  }

  /** Let the chain's marketplace move all of `holder`'s assets. */
  async approveMarketplace(chainId: ChainId, holder: Address): Promise<void> {
    const { ledger, assets, marketplace } = this.chain(chainId);
    await ledger.execute({ sender: holder, to: assets.address, value: 0n }, () =>
      assets.setApprovalForAll(holder, marketplace.address, true)
    );
  }

  deliverAll(): Promise<DeliveryRecord[]> {
    return this.relay.deliverAll();
  }
}
