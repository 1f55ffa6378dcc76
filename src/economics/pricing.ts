import type { EconomicsConfig } from "../config/config.js";
import { PlatformError } from "../errors.js";
import { SCALE } from "./fixed-point.js";

/** Flat surcharge applied per strike on top of the normal action fee. */
export const STRIKE_FEE_MULTIPLIER = 3n;

export type EconomicsParams = {
	/** Whole tokens paid per net like when MAU is 1. */
	baseReward: bigint;
	commissionBps: bigint;
	/** SCALE * baseReward * commissionBps / 10_000, fixed once per params. */
	commissionConstant: bigint;
};

export function createEconomicsParams(baseReward: bigint, commissionBps: bigint): EconomicsParams {
	return {
		baseReward,
		commissionBps,
		commissionConstant: (SCALE * baseReward * commissionBps) / 10_000n,
	};
}

export const DEFAULT_ECONOMICS: EconomicsParams = createEconomicsParams(1000n, 500n);

export function resolveEconomicsParams(config: EconomicsConfig): EconomicsParams {
	return createEconomicsParams(BigInt(config.baseReward), BigInt(config.commissionBps));
}

function mauSquared(mau: bigint): bigint {
	if (mau === 0n) {
		throw new PlatformError("DivisionByZero", "monthly active users is zero");
	}
	return mau * mau;
}

/**
 * Tokens minted per harvested like. Shrinks with the square of MAU.
 */
export function reward(mau: bigint, params: EconomicsParams = DEFAULT_ECONOMICS): bigint {
	return (SCALE * params.baseReward) / mauSquared(mau);
}

/**
 * Fee charged for a like or dislike.
 */
export function fee(mau: bigint, params: EconomicsParams = DEFAULT_ECONOMICS): bigint {
	return params.commissionConstant / mauSquared(mau);
}

/**
 * Upload fee for an account with strikes: linear in the strike count.
 */
export function feeForStrikes(
	strikes: bigint,
	mau: bigint,
	params: EconomicsParams = DEFAULT_ECONOMICS,
): bigint {
	if (strikes === 0n) {
		throw new PlatformError("NoStrikes", "strike fee requested for an account without strikes");
	}
	return STRIKE_FEE_MULTIPLIER * fee(mau, params) * strikes;
}
