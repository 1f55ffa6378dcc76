import { PlatformError } from "../errors.js";
import { SCALE, isqrt, wrappingSub256 } from "./fixed-point.js";

/** Votes required (exclusive) before content can be judged. */
export const MINIMUM_QUORUM = 5n;

/** z-score for a 95% interval, scaled by 10^9. */
const Z_SCORE = 1_960_000_000n;
const Z_SCALE = 1_000_000_000n;
const HALF = SCALE / 2n;

/**
 * Whether the crowd has conclusively disapproved of content.
 *
 * Uses the lower bound of a normal-approximation interval on the dislike
 * share, so a short run of dislikes on a small sample does not qualify.
 */
export function shouldEliminate(likes: bigint, dislikes: bigint): boolean {
	const total = likes + dislikes;
	if (total <= MINIMUM_QUORUM) {
		throw new PlatformError(
			"QuorumNotMet",
			`elimination needs more than ${MINIMUM_QUORUM} votes, got ${total}`,
		);
	}
	if (dislikes === 0n) return false;

	const share = (dislikes * SCALE) / total;
	const variance = (share * (SCALE - share)) / total;
	const margin = (isqrt(variance) * Z_SCORE) / Z_SCALE;

	const lowerBound = wrappingSub256(share, margin);
	// Wrapped past zero: the interval reaches below 0
	if (lowerBound > share) return false;

	return lowerBound > HALF;
}
