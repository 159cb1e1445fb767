import { describe, expect, test } from "vitest";
import { MESSAGE_KINDS, ValidatorUsageError, i64Value, someMessage, strValue } from "../types";
import { ChinaMobile, Email, I64, Str, compilePattern, regexType } from "./field-types";

describe("Str", () => {
	test("accepts any string unchanged", () => {
		expect(Str.fromStr("name", "姓名", "bob")).toEqual({ ok: true, value: strValue("bob") });
		expect(Str.fromStr("name", "姓名", "")).toEqual({ ok: true, value: strValue("") });
		expect(Str.fromStr("name", "姓名", " 张三 ")).toEqual({ ok: true, value: strValue(" 张三 ") });
	});
});

describe("I64", () => {
	test("parses decimal integers to bigint", () => {
		expect(I64.fromStr("age", "年龄", "20")).toEqual({ ok: true, value: i64Value(20n) });
		expect(I64.fromStr("age", "年龄", "-7")).toEqual({ ok: true, value: i64Value(-7n) });
		expect(I64.fromStr("age", "年龄", "007")).toEqual({ ok: true, value: i64Value(7n) });
	});

	test("accepts the full signed 64-bit range", () => {
		expect(I64.fromStr("n", "n", "9223372036854775807")).toEqual({
			ok: true,
			value: i64Value(9223372036854775807n),
		});
		expect(I64.fromStr("n", "n", "-9223372036854775808")).toEqual({
			ok: true,
			value: i64Value(-9223372036854775808n),
		});
	});

	test("rejects values outside the 64-bit range", () => {
		expect(I64.fromStr("n", "n", "9223372036854775808").ok).toBe(false);
		expect(I64.fromStr("n", "n", "-9223372036854775809").ok).toBe(false);
	});

	test.each(["", "+5", " 5", "5 ", "1.5", "abc", "1e3", "-", "0x10"])("rejects %j", (raw) => {
		expect(I64.fromStr("age", "年龄", raw)).toEqual({
			ok: false,
			error: someMessage(MESSAGE_KINDS.FORMAT, "age", "年龄", raw),
		});
	});
});

describe("ChinaMobile", () => {
	test("accepts 11 digits starting with 1", () => {
		expect(ChinaMobile.fromStr("mobile", "手机", "13812345678")).toEqual({
			ok: true,
			value: strValue("13812345678"),
		});
	});

	test.each(["23812345678", "1381234567", "138123456789", "1381234567a", ""])("rejects %j", (raw) => {
		const result = ChinaMobile.fromStr("mobile", "手机", raw);
		expect(result).toEqual({
			ok: false,
			error: someMessage(MESSAGE_KINDS.FORMAT, "mobile", "手机", raw),
		});
	});
});

describe("Email", () => {
	test("accepts common addresses, case-insensitively", () => {
		expect(Email.fromStr("email", "邮箱", "bob@example.com")).toEqual({
			ok: true,
			value: strValue("bob@example.com"),
		});
		expect(Email.fromStr("email", "邮箱", "Bob.Smith+news@Mail.Example.ORG").ok).toBe(true);
	});

	test("the local part is ASCII only", () => {
		expect(Email.fromStr("email", "邮箱", "张三@example.com")).toEqual({
			ok: false,
			error: someMessage(MESSAGE_KINDS.FORMAT, "email", "邮箱", "张三@example.com"),
		});
	});

	test.each(["bob@example", "bob@example.travel", "bob smith@example.com", "@example.com", "bob"])(
		"rejects %j",
		(raw) => {
			expect(Email.fromStr("email", "邮箱", raw).ok).toBe(false);
		}
	);
});

describe("regexType", () => {
	test("full-match check keeps the raw string", () => {
		const zip = regexType(/^\d{6}$/);
		expect(zip.fromStr("zip", "邮编", "100000")).toEqual({ ok: true, value: strValue("100000") });
		expect(zip.fromStr("zip", "邮编", "10000")).toEqual({
			ok: false,
			error: someMessage(MESSAGE_KINDS.FORMAT, "zip", "邮编", "10000"),
		});
	});

	test("a global pattern gives the same answer on repeated calls", () => {
		const lower = regexType(/^[a-z]+$/g);
		expect(lower.fromStr("k", "k", "abc").ok).toBe(true);
		expect(lower.fromStr("k", "k", "abc").ok).toBe(true);
		expect(lower.fromStr("k", "k", "abc").ok).toBe(true);
	});
});

describe("compilePattern", () => {
	test("drops g and y flags, keeps the rest", () => {
		const re = compilePattern(/abc/giy);
		expect(re.flags).toBe("i");
		expect(re.source).toBe("abc");
	});

	test("compiles string patterns", () => {
		expect(compilePattern("l\\dy").test("al5yb")).toBe(true);
	});

	test("throws ValidatorUsageError for an invalid pattern", () => {
		expect(() => compilePattern("(")).toThrow(ValidatorUsageError);
	});
});
