import type { FieldValue, FormInput, Message, Result } from "../types";
import { MESSAGE_KINDS, ValidatorUsageError, err, ok, someMessage } from "../types";
import type { FieldType } from "./field-types";
import { type Rule, matchRules } from "./rules";

// ============================================================================
// Types
// ============================================================================

/**
 * Anything a Validator can run against an input.
 * `null` in a successful result means an optional field was not submitted.
 */
export interface Checkable {
	readonly name: string;
	check(input: FormInput): Result<FieldValue[] | null, Message>;
}

export interface CheckerOptions {
	/** Display name used in messages. Default: the field name */
	title?: string;
	/** Accept a missing field. Default: false */
	optional?: boolean;
	/** Check every submitted value instead of the first. Default: false */
	multiple?: boolean;
	/** Rules to start with, applied in order */
	rules?: readonly Rule[];
}

export type CheckerOption =
	| { readonly option: "optional"; readonly value: boolean }
	| { readonly option: "multiple"; readonly value: boolean };

export const CheckerOption = {
	optional(value = true): CheckerOption {
		return { option: "optional", value };
	},
	multiple(value = true): CheckerOption {
		return { option: "multiple", value };
	},
};

// ============================================================================
// Checker
// ============================================================================

/**
 * Binds one field to a type and its rules.
 *
 * Checkers are immutable: `meet` and `set` return a new checker, so one
 * registered with a Validator cannot change afterwards.
 *
 * ```ts
 * const age = new Checker("age", "年龄", I64).meet(Rule.min(18)).meet(Rule.max(100));
 * const tags = new Checker("tags", Str, { title: "标签", multiple: true });
 * ```
 *
 * A title in the options wins over the positional one; without either the
 * field name is used.
 */
export class Checker implements Checkable {
	readonly name: string;
	readonly title: string;
	readonly fieldType: FieldType;
	readonly rules: readonly Rule[];
	readonly optional: boolean;
	readonly multiple: boolean;

	constructor(name: string, title: string, fieldType: FieldType, options?: CheckerOptions);
	constructor(name: string, fieldType: FieldType, options?: CheckerOptions);
	constructor(
		name: string,
		titleOrType: string | FieldType,
		typeOrOptions?: FieldType | CheckerOptions,
		trailing?: CheckerOptions
	) {
		let title: string | undefined;
		let fieldType: FieldType;
		let options: CheckerOptions;
		if (typeof titleOrType === "string") {
			if (typeOrOptions === undefined || !isFieldType(typeOrOptions)) {
				throw new ValidatorUsageError(`Checker "${name}" needs a field type`);
			}
			title = titleOrType;
			fieldType = typeOrOptions;
			options = trailing ?? {};
		} else {
			fieldType = titleOrType;
			options = typeOrOptions !== undefined && !isFieldType(typeOrOptions) ? typeOrOptions : {};
		}

		this.name = name;
		this.title = options.title ?? title ?? name;
		this.fieldType = fieldType;
		this.rules = Object.freeze([...(options.rules ?? [])]);
		this.optional = options.optional ?? false;
		this.multiple = options.multiple ?? false;
	}

	/**
	 * Add a rule after the existing ones.
	 */
	meet(rule: Rule): Checker {
		return this.derive({ rules: [...this.rules, rule] });
	}

	/**
	 * Change presence or cardinality.
	 */
	set(option: CheckerOption | Omit<CheckerOptions, "rules" | "title">): Checker {
		if ("option" in option) {
			return this.derive(
				option.option === "optional" ? { optional: option.value } : { multiple: option.value }
			);
		}
		return this.derive(option);
	}

	check(input: FormInput): Result<FieldValue[] | null, Message> {
		const values = Object.hasOwn(input, this.name) ? input[this.name] : undefined;

		if (values === undefined || values.length === 0) {
			if (this.optional) {
				return ok(null);
			}
			return err(someMessage(MESSAGE_KINDS.BLANK, this.name, this.title));
		}

		const raws = this.multiple ? values : values.slice(0, 1);
		const parsed: FieldValue[] = [];
		for (const raw of raws) {
			const result = this.checkValue(raw);
			if (!result.ok) {
				return result;
			}
			parsed.push(result.value);
		}
		return ok(parsed);
	}

	/**
	 * Parse and rule a single raw value.
	 */
	checkValue(raw: string): Result<FieldValue, Message> {
		const parsed = this.fieldType.fromStr(this.name, this.title, raw);
		if (!parsed.ok) {
			return parsed;
		}
		const matched = matchRules(parsed.value, this.name, this.title, raw, this.rules);
		if (!matched.ok) {
			return matched;
		}
		return parsed;
	}

	private derive(changes: CheckerOptions): Checker {
		return new Checker(this.name, this.fieldType, {
			title: this.title,
			optional: this.optional,
			multiple: this.multiple,
			rules: this.rules,
			...changes,
		});
	}
}

function isFieldType(value: FieldType | CheckerOptions): value is FieldType {
	return "fromStr" in value && typeof value.fromStr === "function";
}
