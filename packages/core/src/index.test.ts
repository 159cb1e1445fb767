import { describe, expect, test } from "vitest";
import { Checker, I64, Rule, Str, Validator, asI64, asStr, displayValue, englishRenderer } from "./index";

describe("public API", () => {
	test("validates a decoded form", () => {
		const validator = new Validator()
			.check(new Checker("name", "姓名", Str).meet(Rule.max(5)).meet(Rule.min(2)))
			.check(new Checker("age", "年龄", I64).meet(Rule.max(100)).meet(Rule.min(18)));

		validator.validate({ name: ["bob"], age: ["20"] });

		expect(validator.isValid()).toBe(true);
		expect(asStr(validator.getRequired("name"))).toBe("bob");
		expect(asI64(validator.getRequired("age"))).toBe(20n);
		expect(asStr(validator.getRequired("age"))).toBeUndefined();
		expect(displayValue(validator.getRequired("age"))).toBe("20");
	});

	test("renderer is chosen per validator", () => {
		const zh = new Validator().check(new Checker("age", "age", I64));
		const en = new Validator({ renderer: englishRenderer }).check(new Checker("age", "age", I64));

		zh.validate({});
		en.validate({});

		expect(zh.getError("age")).toBe("age不能为空");
		expect(en.getError("age")).toBe("age is missing");
	});
});
