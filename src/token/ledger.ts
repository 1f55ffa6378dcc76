/**
 * Fungible token ledger used to settle fees and mint rewards.
 *
 * The platform consumes the {@link TokenLedger} contract only. The SQLite
 * implementation lives in the same database as the rest of the ledger so a
 * workflow transaction also rolls back any transfer it made.
 */

import type Database from "better-sqlite3";
import { PlatformError } from "../errors.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "token-ledger" });

export interface TokenLedger {
	/** Account the platform acts as for transfer, transferFrom and mint. */
	readonly platformAccount: string;
	balanceOf(account: string): bigint;
	allowance(owner: string, spender: string): bigint;
	/** Move `amount` from `from` to `to`, spending the platform's allowance. */
	transferFrom(from: string, to: string, amount: bigint): void;
	/** Move `amount` out of the platform account. */
	transfer(to: string, amount: bigint): void;
	mint(to: string, amount: bigint): void;
}

function assertRecipient(account: string): void {
	if (account.length === 0) {
		throw new PlatformError("InvalidInput", "token recipient account is empty");
	}
}

function assertAmount(amount: bigint): void {
	if (amount < 0n) {
		throw new PlatformError("InvalidInput", `token amount must not be negative: ${amount}`);
	}
}

export class SqliteTokenLedger implements TokenLedger {
	constructor(
		private readonly db: Database.Database,
		readonly platformAccount: string,
	) {}

	balanceOf(account: string): bigint {
		const row = this.db
			.prepare<[string], { amount: string }>(
				"SELECT amount FROM token_balances WHERE account = ?",
			)
			.get(account);
		return row ? BigInt(row.amount) : 0n;
	}

	allowance(owner: string, spender: string): bigint {
		const row = this.db
			.prepare<[string, string], { amount: string }>(
				"SELECT amount FROM token_allowances WHERE owner = ? AND spender = ?",
			)
			.get(owner, spender);
		return row ? BigInt(row.amount) : 0n;
	}

	totalSupply(): bigint {
		const row = this.db
			.prepare<[], { amount: string }>("SELECT amount FROM token_supply WHERE id = 1")
			.get();
		return row ? BigInt(row.amount) : 0n;
	}

	/**
	 * Let `spender` move up to `amount` of `owner`'s tokens. Replaces any
	 * previous allowance.
	 */
	approve(owner: string, spender: string, amount: bigint): void {
		assertAmount(amount);
		this.db
			.prepare(
				`INSERT INTO token_allowances (owner, spender, amount) VALUES (?, ?, ?)
				 ON CONFLICT(owner, spender) DO UPDATE SET amount = excluded.amount`,
			)
			.run(owner, spender, amount.toString());
		logger.debug({ owner, spender, amount: amount.toString() }, "allowance set");
	}

	transferFrom(from: string, to: string, amount: bigint): void {
		assertAmount(amount);
		const allowed = this.allowance(from, this.platformAccount);
		if (allowed < amount) {
			throw new PlatformError(
				"InsufficientAllowance",
				`allowance ${allowed} of ${from} for ${this.platformAccount} is below ${amount}`,
			);
		}
		this.db.transaction(() => {
			this.move(from, to, amount);
			this.approve(from, this.platformAccount, allowed - amount);
		})();
	}

	transfer(to: string, amount: bigint): void {
		assertAmount(amount);
		this.move(this.platformAccount, to, amount);
	}

	mint(to: string, amount: bigint): void {
		assertRecipient(to);
		assertAmount(amount);
		this.db.transaction(() => {
			this.setBalance(to, this.balanceOf(to) + amount);
			this.db
				.prepare(
					`INSERT INTO token_supply (id, amount) VALUES (1, ?)
					 ON CONFLICT(id) DO UPDATE SET amount = excluded.amount`,
				)
				.run((this.totalSupply() + amount).toString());
		})();
		logger.debug({ to, amount: amount.toString() }, "tokens minted");
	}

	private move(from: string, to: string, amount: bigint): void {
		assertRecipient(to);
		const balance = this.balanceOf(from);
		if (balance < amount) {
			throw new PlatformError(
				"InsufficientBalance",
				`balance ${balance} of ${from} is below ${amount}`,
			);
		}
		this.db.transaction(() => {
			this.setBalance(from, balance - amount);
			this.setBalance(to, this.balanceOf(to) + amount);
		})();
	}

	private setBalance(account: string, amount: bigint): void {
		this.db
			.prepare(
				`INSERT INTO token_balances (account, amount) VALUES (?, ?)
				 ON CONFLICT(account) DO UPDATE SET amount = excluded.amount`,
			)
			.run(account, amount.toString());
	}
}
