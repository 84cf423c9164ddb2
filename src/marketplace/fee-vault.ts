import { Ledger } from '../ledger/ledger';
import { Address, Journaled } from '../ledger/types';
import { MarketplaceError } from './errors';

/**
 * Native fees accrued by one marketplace instance. The value itself sits
 * in the marketplace's native balance; the vault tracks how much of that
 * balance is withdrawable fee income.
 */
export class FeeVault implements Journaled {
  private ledger: Ledger;
  private holder: Address;
  private accrued: bigint = 0n;
  private withdrawn: bigint = 0n;

  constructor(ledger: Ledger, holder: Address) {
    this.ledger = ledger;
    this.holder = holder;
  }

  accrue(amount: bigint): void {
    if (amount < 0n) {
      throw new MarketplaceError('InvalidConfiguration', `Cannot accrue a negative fee (${amount})`);
    }
    this.accrued += amount;
  }

  balance(): bigint {
    return this.accrued - this.withdrawn;
  }

  /** Pays the whole withdrawable balance to `to`; returns the amount paid. */
  withdraw(to: Address): bigint {
    const amount = this.balance();
    if (amount > 0n) {
      this.ledger.transfer(this.holder, to, amount);
      this.withdrawn += amount;
    }
    return amount;
  }

  checkpoint(): () => void {
    const accrued = this.accrued;
    const withdrawn = this.withdrawn;
    return () => {
      this.accrued = accrued;
      this.withdrawn = withdrawn;
    };
  }
}
