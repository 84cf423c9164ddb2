import { Devnet, DevnetChain, ONE_NATIVE } from '../devnet/devnet';
import { MarketEventType } from '../marketplace/event-log';
import { expectedConversionOutput, minimumOutput, withinTolerance } from '../marketplace/fee-policy';
import { DEFAULT_CONVERSION_POLICY } from '../marketplace/marketplace-config';
import { ListingStatus } from '../marketplace/types';
import { InboundDelivery } from '../relay/types';
import { encodePurchaseIntent } from './payload-codec';

const SELLER = '0x' + 'a1'.repeat(20);
const BUYER = '0x' + 'b1'.repeat(20);
const SECOND_BUYER = '0x' + 'b2'.repeat(20);
const THIRD_BUYER = '0x' + 'b3'.repeat(20);
const TREASURY = '0x' + 'c1'.repeat(20);

const STABLE_OUT = 1_994_000_000n;
const REALIZED = 994_009_000_000_000_000n;
const FEE = 25_000_000_000_000_000n;

describe('inbound cross-chain finalization', () => {
  let devnet: Devnet;
  let home: DevnetChain;
  let remote: DevnetChain;

  async function buyFromRemote(buyer: string) {
    const request = {
      destChainId: 101,
      assetContract: home.assets.address,
      assetId: 1n,
      recipient: buyer,
      price: ONE_NATIVE,
      minStableOut: STABLE_OUT,
    };
    return remote.marketplace.buyCrosschain(buyer, remote.marketplace.quotePurchase(request).totalValue, request);
  }

  function delivery(overrides: Partial<InboundDelivery> = {}): InboundDelivery {
    return {
      srcChainId: 102,
      srcAddress: remote.marketplace.address,
      nonce: 77n,
      token: home.stableToken,
      amount: 0n,
      payload: encodePurchaseIntent({ assetContract: home.assets.address, assetId: 1n, recipient: BUYER }),
      ...overrides,
    };
  }

  beforeEach(async () => {
    devnet = Devnet.create({ feeBps: 250 });
    home = devnet.chain(101);
    remote = devnet.chain(102);
    await devnet.mintAsset(101, SELLER, 1n);
    await devnet.approveMarketplace(101, SELLER);
    await home.marketplace.list(SELLER, home.assets.address, 1n, ONE_NATIVE, true);
    await devnet.fund(102, BUYER, 2n * ONE_NATIVE);
    await devnet.fund(102, SECOND_BUYER, 2n * ONE_NATIVE);
    await devnet.fund(102, THIRD_BUYER, 2n * ONE_NATIVE);
  });

  it('settles a purchase that arrives from the trusted peer', async () => {
    await buyFromRemote(BUYER);
    const [record] = await devnet.deliverAll();

    expect(record.status).toBe('delivered');
    expect(home.assets.ownerOf(1n)).toBe(BUYER);
    expect(home.ledger.balanceOf(SELLER)).toBe(REALIZED - FEE);
    expect(home.ledger.balanceOf(SELLER)).toBe(969_009_000_000_000_000n);
    expect(home.marketplace.accruedFees()).toBe(FEE);
    expect(home.ledger.balanceOf(home.marketplace.address)).toBe(FEE);
    expect(home.ledger.tokenBalanceOf(home.stableToken, home.marketplace.address)).toBe(0n);
    expect(home.marketplace.getListingFor(home.assets.address, 1n).status).toBe(ListingStatus.INACTIVE);

    const [finalized] = home.marketplace.events.getEventsByType(MarketEventType.CROSSCHAIN_PURCHASE_FINALIZED);
    expect(finalized.payload).toMatchObject({
      srcChainId: 102,
      nonce: 1n,
      seller: SELLER,
      recipient: BUYER,
      stableAmount: STABLE_OUT,
      realizedWrapped: REALIZED,
      sellerFee: FEE,
      sellerProceeds: 969_009_000_000_000_000n,
      failureId: null,
    });
  });

  it('realizes an amount inside the tolerance band around the expected conversion', async () => {
    await buyFromRemote(BUYER);
    await devnet.deliverAll();

    const expected = expectedConversionOutput(ONE_NATIVE, DEFAULT_CONVERSION_POLICY);
    expect(expected).toBe(994_000_000_000_000_000n);
    expect(minimumOutput(expected, DEFAULT_CONVERSION_POLICY.toleranceBps)).toBe(989_030_000_000_000_000n);
    expect(withinTolerance(REALIZED, expected, DEFAULT_CONVERSION_POLICY.toleranceBps)).toBe(true);
    expect(home.ledger.balanceOf(SELLER) + home.marketplace.accruedFees()).toBe(REALIZED);
  });

  it('finalizes with venue slippage inside the band', async () => {
    home.venue.setSlippageBps(40);
    await buyFromRemote(BUYER);
    await devnet.deliverAll();

    const realized = 990_032_964_000_000_000n;
    expect(withinTolerance(realized, 994_000_000_000_000_000n, 50)).toBe(true);
    expect(home.assets.ownerOf(1n)).toBe(BUYER);
    expect(home.ledger.balanceOf(SELLER)).toBe(realized - FEE);
  });

  it('finalizes at the edge of the band and fails one basis point past it', async () => {
    home.venue.setSlippageBps(50);
    await buyFromRemote(BUYER);
    await devnet.deliverAll();
    expect(home.ledger.balanceOf(SELLER)).toBe(989_038_955_000_000_000n - FEE);

    await devnet.mintAsset(101, SELLER, 2n);
    await home.marketplace.list(SELLER, home.assets.address, 2n, ONE_NATIVE, true);
    home.venue.setSlippageBps(51);
    const request = {
      destChainId: 101,
      assetContract: home.assets.address,
      assetId: 2n,
      recipient: SECOND_BUYER,
      price: ONE_NATIVE,
      minStableOut: STABLE_OUT,
    };
    await remote.marketplace.buyCrosschain(
      SECOND_BUYER,
      remote.marketplace.quotePurchase(request).totalValue,
      request
    );
    await devnet.deliverAll();

    expect(withinTolerance(988_939_554_100_000_000n, 994_000_000_000_000_000n, 50)).toBe(false);
    expect(home.assets.ownerOf(2n)).toBe(SELLER);
    expect(home.marketplace.getFinalizationFailures()).toMatchObject([{ nonce: 2n, reason: 'SwapFailed', status: 'open' }]);
  });

  it('rejects a replayed delivery', async () => {
    const receipt = await buyFromRemote(BUYER);
    await devnet.deliverAll();

    const replay = await devnet.relay.redeliver(receipt.messageId);
    expect(replay.status).toBe('failed');
    expect(replay.errorCode).toBe('DuplicateDelivery');
    expect(home.ledger.balanceOf(SELLER)).toBe(REALIZED - FEE);
  });

  it('rejects the later of two purchases and lets the owner recover its stable', async () => {
    await buyFromRemote(BUYER);
    await buyFromRemote(SECOND_BUYER);
    const [first, second] = await devnet.deliverAll();

    expect(first.status).toBe('delivered');
    expect(second.status).toBe('delivered');
    expect(home.assets.ownerOf(1n)).toBe(BUYER);
    expect(home.ledger.tokenBalanceOf(home.stableToken, home.marketplace.address)).toBe(STABLE_OUT);

    const [rejected] = home.marketplace.getRejectedDeliveries();
    expect(rejected).toMatchObject({
      srcChainId: 102,
      nonce: 2n,
      stableAmount: STABLE_OUT,
      recipient: SECOND_BUYER,
      reason: 'NotActiveCrossChainListing',
      status: 'held',
    });
    expect(home.marketplace.heldStableBalance()).toBe(STABLE_OUT);
    const [event] = home.marketplace.events.getEventsByType(MarketEventType.CROSSCHAIN_DELIVERY_REJECTED);
    expect(event.payload).toMatchObject({ deliveryId: rejected.deliveryId, nonce: 2n, stableAmount: STABLE_OUT });

    await expect(home.marketplace.recoverBridgedFunds(SELLER, TREASURY)).rejects.toMatchObject({
      code: 'Unauthorized',
    });
    await expect(home.marketplace.recoverBridgedFunds(devnet.owner, TREASURY, 'missing')).rejects.toMatchObject({
      code: 'UnknownDelivery',
    });
    expect(await home.marketplace.recoverBridgedFunds(devnet.owner, TREASURY)).toBe(STABLE_OUT);
    expect(home.ledger.tokenBalanceOf(home.stableToken, TREASURY)).toBe(STABLE_OUT);
    expect(home.marketplace.getRejectedDeliveries()[0]).toMatchObject({ status: 'recovered', recoveredTo: TREASURY });
    await expect(home.marketplace.recoverBridgedFunds(devnet.owner, TREASURY)).rejects.toMatchObject({
      code: 'InsufficientFunds',
    });
    await expect(
      home.marketplace.recoverBridgedFunds(devnet.owner, TREASURY, rejected.deliveryId)
    ).rejects.toMatchObject({ code: 'FailureAlreadyResolved' });
  });

  it('never settles a re-listed asset with a delivery that was rejected as stale', async () => {
    await buyFromRemote(BUYER);
    const second = await buyFromRemote(SECOND_BUYER);
    await buyFromRemote(THIRD_BUYER);
    await devnet.deliverAll();

    const secondRecord = home.marketplace.getRejectedDeliveries().find(r => r.nonce === 2n);
    expect(secondRecord).toBeDefined();
    const moved = await home.marketplace.recoverBridgedFunds(devnet.owner, TREASURY, secondRecord?.deliveryId);
    expect(moved).toBe(STABLE_OUT);

    await devnet.approveMarketplace(101, BUYER);
    await home.marketplace.list(BUYER, home.assets.address, 1n, ONE_NATIVE, true);

    await expect(devnet.relay.retry(second.messageId)).rejects.toMatchObject({ code: 'NotRetryable' });
    const replay = await devnet.relay.redeliver(second.messageId);
    expect(replay.status).toBe('failed');
    expect(replay.errorCode).toBe('DuplicateDelivery');

    expect(home.assets.ownerOf(1n)).toBe(BUYER);
    expect(home.marketplace.getListingFor(home.assets.address, 1n).status).toBe(ListingStatus.ACTIVE_CROSSCHAIN);
    expect(home.ledger.tokenBalanceOf(home.stableToken, TREASURY)).toBe(STABLE_OUT);
    expect(home.ledger.tokenBalanceOf(home.stableToken, home.marketplace.address)).toBe(STABLE_OUT);
    expect(home.marketplace.heldStableBalance()).toBe(STABLE_OUT);
  });

  it('checks the caller, then the sender, then the asset, then the payload, then the listing', async () => {
    const relay = home.endpoint.address;
    const stranger = '0x' + 'dd'.repeat(20);

    await expect(
      home.marketplace.receiveCrossChain(stranger, delivery({ srcAddress: stranger }))
    ).rejects.toMatchObject({ code: 'UnauthorizedRelay' });
    await expect(
      home.marketplace.receiveCrossChain(relay, delivery({ srcAddress: stranger, token: stranger }))
    ).rejects.toMatchObject({ code: 'UntrustedSender' });
    await expect(home.marketplace.receiveCrossChain(relay, delivery({ srcChainId: 999 }))).rejects.toMatchObject({
      code: 'UntrustedSender',
    });
    await expect(
      home.marketplace.receiveCrossChain(relay, delivery({ token: stranger, payload: Buffer.from('ff', 'hex') }))
    ).rejects.toMatchObject({ code: 'UnexpectedBridgeAsset' });
    await expect(
      home.marketplace.receiveCrossChain(relay, delivery({ payload: Buffer.from('ff', 'hex') }))
    ).rejects.toMatchObject({ code: 'MalformedPayload' });

    const otherAsset = encodePurchaseIntent({ assetContract: home.assets.address, assetId: 2n, recipient: BUYER });
    const outcome = await home.marketplace.receiveCrossChain(relay, delivery({ payload: otherAsset }));
    expect(outcome).toMatchObject({ status: 'rejected', reason: 'NotActiveCrossChainListing' });
    expect(home.marketplace.getFinalizationFailures()).toEqual([]);
  });

  it('burns the nonce of a delivery rejected as stale', async () => {
    const relay = home.endpoint.address;
    await home.marketplace.delist(SELLER, home.assets.address, 1n);
    const outcome = await home.marketplace.receiveCrossChain(relay, delivery());
    expect(outcome).toMatchObject({ status: 'rejected', reason: 'NotActiveCrossChainListing' });

    await home.marketplace.list(SELLER, home.assets.address, 1n, ONE_NATIVE, true);
    await expect(home.marketplace.receiveCrossChain(relay, delivery())).rejects.toMatchObject({
      code: 'DuplicateDelivery',
    });
    expect(home.marketplace.getFinalizationFailures()).toEqual([]);
    expect(home.assets.ownerOf(1n)).toBe(SELLER);
  });

  it('lets an unexpected error revert the whole callback', async () => {
    await buyFromRemote(BUYER);
    const unwrap = jest.spyOn(home.ledger, 'unwrap').mockImplementation(() => {
      throw new TypeError('unwrap exploded');
    });
    const [record] = await devnet.deliverAll();
    unwrap.mockRestore();

    expect(record.status).toBe('failed');
    expect(record.error).toBe('unwrap exploded');
    expect(home.marketplace.getFinalizationFailures()).toEqual([]);
    expect(home.ledger.tokenBalanceOf(home.stableToken, home.marketplace.address)).toBe(STABLE_OUT);

    const retried = await devnet.relay.retry(record.messageId);
    expect(retried.status).toBe('delivered');
    expect(home.assets.ownerOf(1n)).toBe(BUYER);
  });

  it('rejects a local-only listing', async () => {
    await home.marketplace.delist(SELLER, home.assets.address, 1n);
    await home.marketplace.list(SELLER, home.assets.address, 1n, ONE_NATIVE, false);
    await buyFromRemote(BUYER);
    const [record] = await devnet.deliverAll();
    expect(record.status).toBe('delivered');
    expect(home.marketplace.getRejectedDeliveries()).toMatchObject([{ nonce: 1n, status: 'held' }]);
    expect(home.assets.ownerOf(1n)).toBe(SELLER);
  });

  describe('when settlement fails', () => {
    beforeEach(async () => {
      home.venue.setSlippageBps(100);
      await buyFromRemote(BUYER);
      await devnet.deliverAll();
    });

    it('holds the stable amount against an open failure record', () => {
      const [failure] = home.marketplace.getFinalizationFailures();
      expect(failure).toMatchObject({
        srcChainId: 102,
        nonce: 1n,
        stableAmount: STABLE_OUT,
        recipient: BUYER,
        reason: 'SwapFailed',
        status: 'open',
      });
      expect(home.marketplace.getFailure(failure.failureId)).toEqual(failure);
      expect(home.marketplace.getFailure('missing')).toBeUndefined();
      expect(home.marketplace.heldStableBalance()).toBe(STABLE_OUT);
      expect(home.ledger.tokenBalanceOf(home.stableToken, home.marketplace.address)).toBe(STABLE_OUT);
      expect(home.assets.ownerOf(1n)).toBe(SELLER);
      expect(home.ledger.balanceOf(SELLER)).toBe(0n);
      expect(home.marketplace.getListingFor(home.assets.address, 1n).status).toBe(ListingStatus.ACTIVE_CROSSCHAIN);

      const [failed] = home.marketplace.events.getEventsByType(MarketEventType.CROSSCHAIN_FINALIZATION_FAILED);
      expect(failed.payload.failureId).toBe(failure.failureId);
      expect(devnet.relay.getDeliveries()[0].status).toBe('delivered');
    });

    it('keeps stable held by a failure out of recovery', async () => {
      await expect(home.marketplace.recoverBridgedFunds(devnet.owner, TREASURY)).rejects.toMatchObject({
        code: 'InsufficientFunds',
      });
    });

    it('settles on an owner retry once conditions recover', async () => {
      const [failure] = home.marketplace.getFinalizationFailures();
      await expect(home.marketplace.retryFinalization(SELLER, failure.failureId)).rejects.toMatchObject({
        code: 'Unauthorized',
      });
      await expect(home.marketplace.retryFinalization(devnet.owner, failure.failureId)).rejects.toMatchObject({
        code: 'SwapFailed',
      });
      expect(home.marketplace.getFinalizationFailures()[0].status).toBe('open');

      home.venue.setSlippageBps(0);
      const outcome = await home.marketplace.retryFinalization(devnet.owner, failure.failureId);
      expect(outcome).toMatchObject({ status: 'finalized', sellerProceeds: REALIZED - FEE });
      expect(home.assets.ownerOf(1n)).toBe(BUYER);
      expect(home.marketplace.heldStableBalance()).toBe(0n);

      const [updated] = home.marketplace.getFinalizationFailures();
      expect(updated.status).toBe('retried');
      const [finalized] = home.marketplace.events.getEventsByType(MarketEventType.CROSSCHAIN_PURCHASE_FINALIZED);
      expect(finalized.payload.failureId).toBe(failure.failureId);

      await expect(home.marketplace.retryFinalization(devnet.owner, failure.failureId)).rejects.toMatchObject({
        code: 'FailureAlreadyResolved',
      });
    });

    it('accepts a lower floor on retry', async () => {
      const [failure] = home.marketplace.getFinalizationFailures();
      const realized = 984_068_910_000_000_000n;
      const outcome = await home.marketplace.retryFinalization(devnet.owner, failure.failureId, {
        minOutputOverride: realized,
      });
      expect(outcome).toMatchObject({ status: 'finalized', realizedWrapped: realized, sellerProceeds: realized - FEE });
      expect(home.ledger.balanceOf(SELLER)).toBe(959_068_910_000_000_000n);
    });

    it('refunds the held stable to an address the owner picks', async () => {
      const [failure] = home.marketplace.getFinalizationFailures();
      const refunded = await home.marketplace.refundFailure(devnet.owner, failure.failureId, TREASURY);

      expect(refunded.status).toBe('refunded');
      expect(home.ledger.tokenBalanceOf(home.stableToken, TREASURY)).toBe(STABLE_OUT);
      expect(home.marketplace.heldStableBalance()).toBe(0n);
      await expect(home.marketplace.refundFailure(devnet.owner, failure.failureId, TREASURY)).rejects.toMatchObject({
        code: 'FailureAlreadyResolved',
      });
      await expect(home.marketplace.refundFailure(devnet.owner, 'missing', TREASURY)).rejects.toMatchObject({
        code: 'UnknownFailure',
      });
    });

    it('refuses a retry once the listing is gone', async () => {
      const [failure] = home.marketplace.getFinalizationFailures();
      await home.marketplace.delist(SELLER, home.assets.address, 1n);
      await expect(home.marketplace.retryFinalization(devnet.owner, failure.failureId)).rejects.toMatchObject({
        code: 'NotActiveCrossChainListing',
      });
    });

    it('rejects a replay of the failed delivery', async () => {
      const [record] = devnet.relay.getDeliveries();
      const replay = await devnet.relay.redeliver(record.messageId);
      expect(replay.errorCode).toBe('DuplicateDelivery');
      expect(home.marketplace.getFinalizationFailures()).toHaveLength(1);
    });
  });
});
