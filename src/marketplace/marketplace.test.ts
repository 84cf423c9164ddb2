import { Devnet, DevnetChain, ONE_NATIVE } from '../devnet/devnet';
import { MarketEventType } from './event-log';

const SELLER = '0x' + 'a1'.repeat(20);
const BUYER = '0x' + 'b1'.repeat(20);
const TREASURY = '0x' + 'c1'.repeat(20);
const NEW_OWNER = '0x' + 'c2'.repeat(20);

describe('Marketplace', () => {
  let devnet: Devnet;
  let home: DevnetChain;

  beforeEach(async () => {
    devnet = Devnet.create({ feeBps: 250 });
    home = devnet.chain(101);
  });

  async function sellOneLocally(): Promise<void> {
    await devnet.mintAsset(101, SELLER, 1n);
    await devnet.approveMarketplace(101, SELLER);
    await devnet.fund(101, BUYER, ONE_NATIVE);
    await home.marketplace.list(SELLER, home.assets.address, 1n, ONE_NATIVE, false);
    await home.marketplace.buyLocal(BUYER, ONE_NATIVE, home.assets.address, 1n, BUYER);
  }

  describe('fees', () => {
    it('lets the owner withdraw accrued fees once', async () => {
      await sellOneLocally();
      await expect(home.marketplace.withdrawFees(SELLER, TREASURY)).rejects.toMatchObject({ code: 'Unauthorized' });

      expect(await home.marketplace.withdrawFees(devnet.owner, TREASURY)).toBe(25_000_000_000_000_000n);
      expect(home.ledger.balanceOf(TREASURY)).toBe(25_000_000_000_000_000n);
      expect(home.marketplace.accruedFees()).toBe(0n);
      expect(await home.marketplace.withdrawFees(devnet.owner, TREASURY)).toBe(0n);

      const withdrawals = home.marketplace.events.getEventsByType(MarketEventType.FEES_WITHDRAWN);
      expect(withdrawals.map(e => e.payload.amount)).toEqual([25_000_000_000_000_000n, 0n]);
    });

    it('applies a new fee to later purchases only', async () => {
      await home.marketplace.setFeeBps(devnet.owner, 1_000);
      await sellOneLocally();
      expect(home.ledger.balanceOf(SELLER)).toBe(900_000_000_000_000_000n);
      await expect(home.marketplace.setFeeBps(devnet.owner, 10_001)).rejects.toMatchObject({
        code: 'InvalidConfiguration',
      });
    });
  });

  describe('configuration', () => {
    it('records every change in the event log', async () => {
      const other = '0x' + 'ee'.repeat(20);
      await home.marketplace.addApprovedAsset(devnet.owner, other);
      await home.marketplace.removeApprovedAsset(devnet.owner, other);
      await home.marketplace.setTrustedPeer(devnet.owner, 103, '0xABCD');
      await home.marketplace.removeTrustedPeer(devnet.owner, 103);
      await home.marketplace.setFeeBps(devnet.owner, 100);

      const updates = home.marketplace.events.getEventsByType(MarketEventType.CONFIG_UPDATED).map(e => e.payload);
      expect(updates.map(u => [u.setting, u.action, u.value])).toEqual([
        ['approvedAsset', 'set', other],
        ['approvedAsset', 'removed', other],
        ['trustedPeer', 'set', '103=0xabcd'],
        ['trustedPeer', 'removed', '103'],
        ['feeBps', 'set', '100'],
      ]);
      expect(updates.every(u => u.updatedBy === devnet.owner)).toBe(true);
    });

    it('rejects changes from anyone but the owner without logging them', async () => {
      const before = home.marketplace.events.size();
      await expect(home.marketplace.setFeeBps(SELLER, 1)).rejects.toMatchObject({ code: 'Unauthorized' });
      await expect(home.marketplace.setTrustedPeer(SELLER, 5, '0x01')).rejects.toMatchObject({ code: 'Unauthorized' });
      await expect(home.marketplace.addApprovedAsset(SELLER, TREASURY)).rejects.toMatchObject({
        code: 'Unauthorized',
      });
      await expect(home.marketplace.setConversionPolicy(SELLER, { toleranceBps: 1 })).rejects.toMatchObject({
        code: 'Unauthorized',
      });
      expect(home.marketplace.events.size()).toBe(before);
    });

    it('validates addresses before touching the ledger', async () => {
      await expect(home.marketplace.addApprovedAsset(devnet.owner, '0x1234')).rejects.toMatchObject({
        code: 'InvalidAddress',
      });
      await expect(home.marketplace.setTrustedPeer(devnet.owner, 5, 'peer')).rejects.toMatchObject({
        code: 'InvalidAddress',
      });
      await expect(home.marketplace.buyLocal('nobody', 1n, home.assets.address, 1n, BUYER)).rejects.toMatchObject({
        code: 'InvalidAddress',
      });
    });

    it('hands control to the new owner', async () => {
      await home.marketplace.transferOwnership(devnet.owner, NEW_OWNER);
      expect(home.marketplace.config.owner).toBe(NEW_OWNER);
      await expect(home.marketplace.setFeeBps(devnet.owner, 1)).rejects.toMatchObject({ code: 'Unauthorized' });
      await home.marketplace.setFeeBps(NEW_OWNER, 1);
      expect(home.marketplace.config.feeBps).toBe(1);
    });

    it('returns the merged conversion policy', async () => {
      const policy = await home.marketplace.setConversionPolicy(devnet.owner, { toleranceBps: 75 });
      expect(policy).toEqual({
        roundTripCostBps: 60,
        toleranceBps: 75,
        poolFee: 3000,
        swapDeadlineSeconds: 900,
        allowUnboundedSwaps: false,
      });
      const [update] = home.marketplace.events.getEventsByType(MarketEventType.CONFIG_UPDATED);
      expect(update.payload.value).toBe(JSON.stringify(policy));
    });
  });

  it('keeps a valid hash chain across a mixed history', async () => {
    await sellOneLocally();
    await home.marketplace.setFeeBps(devnet.owner, 100);
    await home.marketplace.withdrawFees(devnet.owner, TREASURY);
    expect(home.marketplace.events.size()).toBe(4);
    expect(home.marketplace.events.verifyHashChain()).toBe(true);
  });
});
