import { describe, expect, it } from "vitest";
import { FundNotInitializedError, UnauthorizedCallerError } from "../shared/errors.js";
import { accountId, fundId } from "../shared/identifiers.js";
import { OwnedStore, requireCaller } from "./owned-store.js";

const owner = accountId("owner");
const fund = fundId("fund-1");

describe("requireCaller", () => {
	it("passes for the expected principal", () => {
		expect(() => requireCaller(owner, owner, "op")).not.toThrow();
	});

	it("names the operation and both principals", () => {
		try {
			requireCaller(accountId("someone"), owner, "Fee.settle");
			expect.unreachable("should have thrown");
		} catch (e) {
			expect(e).toBeInstanceOf(UnauthorizedCallerError);
			if (e instanceof UnauthorizedCallerError) {
				expect(e.message).toBe("Fee.settle: caller is not authorized");
				expect(e.context).toEqual({ caller: "someone", expected: "owner" });
			}
		}
	});
});

describe("OwnedStore", () => {
	it("require() throws with the store label", () => {
		const store = new OwnedStore<number>(owner, "Widgets");
		expect(() => store.require(fund)).toThrow(FundNotInitializedError);
		expect(() => store.require(fund)).toThrow("Widgets: fund is not configured");
	});

	it("a restore can be applied more than once", () => {
		const store = new OwnedStore<number>(owner, "Widgets");
		store.set(owner, fund, 1);
		const restore = store.checkpoint();

		store.set(owner, fund, 2);
		restore();
		store.set(owner, fund, 3);
		restore();

		expect(store.get(fund)).toBe(1);
	});
});
