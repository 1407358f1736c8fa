import { FeeHook, type HookEvent, type HookPayload } from "../fees/types.js";
import { parseOrThrow, z } from "../lib/validation/index.js";
import { accountId } from "../shared/identifiers.js";

const account = z
	.string()
	.trim()
	.min(1)
	.transform((s) => accountId(s));
const shares = z.bigint().nonnegative();

const hookEventSchema = z.discriminatedUnion("hook", [
	z.object({ hook: z.literal(FeeHook.Continuous) }),
	z.object({
		hook: z.literal(FeeHook.PreBuyShares),
		buyer: account,
		investmentAmount: shares,
	}),
	z.object({
		hook: z.literal(FeeHook.PostBuyShares),
		buyer: account,
		investmentAmount: shares,
		sharesBought: shares,
	}),
	z.object({
		hook: z.literal(FeeHook.PreRedeemShares),
		redeemer: account,
		sharesRedeemed: shares,
	}),
]);

/**
 * Joins a hook and its payload into a HookEvent.
 * @throws ValidationError if the payload is missing fields or holds negative amounts
 */
export function toHookEvent<H extends FeeHook>(hook: H, payload: HookPayload<H>): HookEvent {
	return parseOrThrow(hookEventSchema, { ...payload, hook }, `Invalid ${hook} payload`);
}
