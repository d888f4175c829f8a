/**
 * Token Ledger
 *
 * The fungible-token ledger that actually custodies value. The escrow only
 * talks to it through this interface; every call acts as the escrow's own
 * custody account.
 */

import { getAddress, type Address, type Hash } from "viem";

/**
 * Calls resolve `false` when nothing moved. A transfer that was submitted but
 * whose outcome is unknown throws `TransferPendingError` instead.
 */
export interface TokenLedger {
  /** Pull `amount` from `from` to `to` using the custody account's allowance. */
  transferFrom(from: Address, to: Address, amount: bigint): Promise<boolean>;
  /** Push `amount` out of the custody account. */
  transfer(to: Address, amount: bigint): Promise<boolean>;
  approve(spender: Address, amount: bigint): Promise<boolean>;
  balanceOf(address: Address): Promise<bigint>;
}

/**
 * A transfer was submitted as `hash` but never confirmed either way. The escrow
 * books it as done and reports the hash as unconfirmed.
 */
export class TransferPendingError extends Error {
  readonly hash: Hash;

  constructor(hash: Hash, detail: string) {
    super(`${detail} unconfirmed in ${hash}`);
    this.name = "TransferPendingError";
    this.hash = hash;
  }
}

/**
 * In-memory ERC-20 lookalike. Suitable for development and testing.
 * WARNING: All data is lost on process restart
 */
export class InMemoryTokenLedger implements TokenLedger {
  private readonly balances = new Map<Address, bigint>();
  private readonly allowances = new Map<string, bigint>();
  readonly custodian: Address;

  constructor(custodian: Address) {
    this.custodian = getAddress(custodian);
  }

  /** Credit `amount` new tokens to `address`. */
  mint(address: Address, amount: bigint): void {
    const key = getAddress(address);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  /** Record an allowance granted by `owner`, as `owner.approve(spender)` would. */
  approveFrom(owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  async transferFrom(from: Address, to: Address, amount: bigint): Promise<boolean> {
    const allowed = this.allowance(from, this.custodian);
    if (allowed < amount) return false;
    if (!this.move(from, to, amount)) return false;
    this.allowances.set(allowanceKey(from, this.custodian), allowed - amount);
    return true;
  }

  async transfer(to: Address, amount: bigint): Promise<boolean> {
    return this.move(this.custodian, to, amount);
  }

  async approve(spender: Address, amount: bigint): Promise<boolean> {
    this.approveFrom(this.custodian, spender, amount);
    return true;
  }

  async balanceOf(address: Address): Promise<bigint> {
    return this.balances.get(getAddress(address)) ?? 0n;
  }

  private move(from: Address, to: Address, amount: bigint): boolean {
    if (amount < 0n) return false;
    const source = getAddress(from);
    const target = getAddress(to);
    const available = this.balances.get(source) ?? 0n;
    if (available < amount) return false;
    this.balances.set(source, available - amount);
    this.balances.set(target, (this.balances.get(target) ?? 0n) + amount);
    return true;
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${getAddress(owner)}:${getAddress(spender)}`;
}
