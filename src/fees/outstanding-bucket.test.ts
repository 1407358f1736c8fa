import { describe, expect, it } from "vitest";
import { ArithmeticOverflowError, UnauthorizedCallerError } from "../shared/errors.js";
import { accountId, fundId } from "../shared/identifiers.js";
import { OutstandingBucket } from "./outstanding-bucket.js";

const owner = accountId("performance-fee");
const fund = fundId("fund-1");

describe("OutstandingBucket", () => {
	it("starts empty", () => {
		expect(new OutstandingBucket(owner).balanceOf(fund)).toBe(0n);
	});

	it("increases and decreases", () => {
		const bucket = new OutstandingBucket(owner);
		bucket.increase(owner, fund, 50n);
		bucket.decrease(owner, fund, 20n);
		expect(bucket.balanceOf(fund)).toBe(30n);
	});

	it("rejects removing more than it holds", () => {
		const bucket = new OutstandingBucket(owner);
		bucket.increase(owner, fund, 5n);
		expect(() => bucket.decrease(owner, fund, 6n)).toThrow(ArithmeticOverflowError);
		expect(bucket.balanceOf(fund)).toBe(5n);
	});

	it("drain empties the bucket and returns its content", () => {
		const bucket = new OutstandingBucket(owner);
		bucket.increase(owner, fund, 42n);
		expect(bucket.drain(owner, fund)).toBe(42n);
		expect(bucket.drain(owner, fund)).toBe(0n);
		expect(bucket.balanceOf(fund)).toBe(0n);
	});

	it("rejects writes from other principals", () => {
		const bucket = new OutstandingBucket(owner);
		expect(() => bucket.increase(accountId("fee-manager"), fund, 1n)).toThrow(
			UnauthorizedCallerError,
		);
		expect(bucket.balanceOf(fund)).toBe(0n);
	});

	it("keeps funds apart", () => {
		const bucket = new OutstandingBucket(owner);
		bucket.increase(owner, fund, 7n);
		expect(bucket.balanceOf(fundId("fund-2"))).toBe(0n);
	});

	it("checkpoint restores the previous balance", () => {
		const bucket = new OutstandingBucket(owner);
		bucket.increase(owner, fund, 7n);
		const restore = bucket.checkpoint();
		bucket.drain(owner, fund);
		restore();
		expect(bucket.balanceOf(fund)).toBe(7n);
	});
});
