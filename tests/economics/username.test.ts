import { describe, expect, it } from "vitest";
import { thrownBy } from "../helpers.js";
import { isValidUsername, validateUsername } from "../../src/economics/username.js";

describe("username validation", () => {
	it("accepts a padded name and strips the padding", () => {
		expect(validateUsername("ab_1".padEnd(15, "\0"))).toBe("ab_1");
		expect(validateUsername("ab_1")).toBe("ab_1");
	});

	it("accepts a name filling all fifteen slots", () => {
		expect(validateUsername("abcdefghij_1234")).toBe("abcdefghij_1234");
	});

	it("rejects names shorter than four characters", () => {
		expect(isValidUsername("ab1")).toBe(false);
		expect(isValidUsername("ab1\0\0\0")).toBe(false);
	});

	it("rejects characters after the padding starts", () => {
		expect(isValidUsername("ab\0cd")).toBe(false);
	});

	it("rejects characters outside a-z, 0-9 and _", () => {
		expect(isValidUsername("AB12")).toBe(false);
		expect(isValidUsername("ab-12")).toBe(false);
		expect(isValidUsername("ab 12")).toBe(false);
		expect(isValidUsername("abcé")).toBe(false);
	});

	it("rejects empty and oversized names", () => {
		expect(isValidUsername("")).toBe(false);
		expect(isValidUsername("abcdefghijklmnop")).toBe(false);
	});

	it("reports the failure code", () => {
		expect(thrownBy(() => validateUsername("AB12"))).toMatchObject({ code: "InvalidUsername" });
	});
});
