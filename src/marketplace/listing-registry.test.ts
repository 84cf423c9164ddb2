import { Devnet, DevnetChain, ONE_NATIVE } from '../devnet/devnet';
import { ZERO_ADDRESS } from '../ledger/address';
import { MarketEventType } from './event-log';
import { ListingRegistry } from './listing-registry';
import { ListingStatus } from './types';

const SELLER = '0x' + 'a1'.repeat(20);
const STRANGER = '0x' + 'a2'.repeat(20);

describe('listing registry', () => {
  let devnet: Devnet;
  let home: DevnetChain;

  beforeEach(async () => {
    devnet = Devnet.create();
    home = devnet.chain(101);
    await devnet.mintAsset(101, SELLER, 1n);
  });

  it('lists an approved asset the caller holds', async () => {
    const listing = await home.marketplace.list(SELLER, home.assets.address, 1n, ONE_NATIVE, false);

    expect(listing).toEqual({
      key: ListingRegistry.keyFor(home.assets.address, 1n),
      seller: SELLER,
      assetContract: home.assets.address,
      assetId: 1n,
      price: ONE_NATIVE,
      status: ListingStatus.ACTIVE_LOCAL,
    });
    expect(home.marketplace.getListing(listing.key)).toEqual(listing);
    const [created] = home.marketplace.events.getEventsByType(MarketEventType.LISTING_CREATED);
    expect(created.payload.status).toBe(ListingStatus.ACTIVE_LOCAL);
    expect(created.payload.price).toBe(ONE_NATIVE);
  });

  it('keys listings case-insensitively on the contract address', () => {
    expect(ListingRegistry.keyFor(home.assets.address.toUpperCase().replace('0X', '0x'), 1n)).toBe(
      ListingRegistry.keyFor(home.assets.address, 1n)
    );
    expect(ListingRegistry.keyFor(home.assets.address, 1n)).not.toBe(ListingRegistry.keyFor(home.assets.address, 2n));
  });

  it('refuses to list an unapproved contract or an asset the caller does not hold', async () => {
    const unapproved = '0x' + '99'.repeat(20);
    await expect(home.marketplace.list(STRANGER, unapproved, 1n, 0n, false)).rejects.toMatchObject({
      code: 'NotApprovedNFT',
      message: `Asset contract ${unapproved} is not approved`,
    });
    await expect(home.marketplace.list(STRANGER, home.assets.address, 1n, 0n, false)).rejects.toMatchObject({
      code: 'NotApprovedNFT',
      message: `${STRANGER} does not hold ${home.assets.address} #1`,
    });
    await expect(home.marketplace.list(SELLER, home.assets.address, 2n, ONE_NATIVE, false)).rejects.toMatchObject({
      code: 'NotApprovedNFT',
    });
    await expect(home.marketplace.list(SELLER, home.assets.address, 1n, 0n, false)).rejects.toMatchObject({
      code: 'InvalidPrice',
    });
  });

  it('stops accepting listings once a contract is unapproved', async () => {
    await home.marketplace.removeApprovedAsset(devnet.owner, home.assets.address);
    await expect(home.marketplace.list(SELLER, home.assets.address, 1n, ONE_NATIVE, false)).rejects.toMatchObject({
      code: 'NotApprovedNFT',
    });
  });

  it('edits the price of an active listing only', async () => {
    await expect(home.marketplace.editPrice(SELLER, home.assets.address, 1n, 5n)).rejects.toMatchObject({
      code: 'ListingNotActive',
    });

    await home.marketplace.list(SELLER, home.assets.address, 1n, ONE_NATIVE, true);
    await expect(home.marketplace.editPrice(STRANGER, home.assets.address, 1n, 5n)).rejects.toMatchObject({
      code: 'NotTokenOwner',
    });
    await expect(home.marketplace.editPrice(SELLER, home.assets.address, 1n, 0n)).rejects.toMatchObject({
      code: 'InvalidPrice',
    });

    const edited = await home.marketplace.editPrice(SELLER, home.assets.address, 1n, 5n);
    expect(edited.price).toBe(5n);
    expect(edited.status).toBe(ListingStatus.ACTIVE_CROSSCHAIN);
    const [update] = home.marketplace.events.getEventsByType(MarketEventType.LISTING_PRICE_UPDATED);
    expect(update.payload).toMatchObject({ oldPrice: ONE_NATIVE, newPrice: 5n, updatedBy: SELLER });
  });

  it('delists idempotently', async () => {
    await home.marketplace.list(SELLER, home.assets.address, 1n, ONE_NATIVE, false);
    const first = await home.marketplace.delist(SELLER, home.assets.address, 1n);
    const second = await home.marketplace.delist(SELLER, home.assets.address, 1n);

    expect(first.status).toBe(ListingStatus.INACTIVE);
    expect(second.status).toBe(ListingStatus.INACTIVE);
    expect(home.marketplace.events.getEventsByType(MarketEventType.LISTING_CANCELLED)).toHaveLength(1);
    expect(home.marketplace.activeListings()).toEqual([]);
  });

  it('returns an empty record for a listing that never existed', async () => {
    const cleared = await home.marketplace.delist(SELLER, home.assets.address, 1n);
    expect(cleared).toEqual({
      key: ListingRegistry.keyFor(home.assets.address, 1n),
      seller: ZERO_ADDRESS,
      assetContract: ZERO_ADDRESS,
      assetId: 0n,
      price: 0n,
      status: ListingStatus.INACTIVE,
    });
  });

  it('only lets the holder delist', async () => {
    await home.marketplace.list(SELLER, home.assets.address, 1n, ONE_NATIVE, false);
    await expect(home.marketplace.delist(STRANGER, home.assets.address, 1n)).rejects.toMatchObject({
      code: 'NotTokenOwner',
    });
  });

  it('overwrites the previous listing when relisting', async () => {
    await home.marketplace.list(SELLER, home.assets.address, 1n, ONE_NATIVE, false);
    await home.marketplace.delist(SELLER, home.assets.address, 1n);
    const relisted = await home.marketplace.list(SELLER, home.assets.address, 1n, 3n, true);

    expect(relisted.price).toBe(3n);
    expect(home.marketplace.activeListings()).toEqual([relisted]);
  });

  it('leaves no trace of a rejected call in the event log', async () => {
    const before = home.marketplace.events.size();
    await expect(home.marketplace.list(SELLER, home.assets.address, 1n, 0n, false)).rejects.toMatchObject({
      code: 'InvalidPrice',
    });
    expect(home.marketplace.events.size()).toBe(before);
  });
});
