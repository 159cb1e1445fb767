import { defaultRenderer, renderMessage } from "../locale";
import type { MessageRenderer } from "../locale";
import type { FieldValue, FormInput } from "../types";
import { ValidatorUsageError } from "../types";
import type { Checkable } from "./checker";

// ============================================================================
// Types
// ============================================================================

export interface ValidatorOptions {
	/** Renders failures to text. Default: defaultRenderer (Chinese) */
	renderer?: MessageRenderer;
}

// ============================================================================
// Validator
// ============================================================================

/**
 * Runs a set of checkers against one input at a time.
 *
 * Register checkers with `check`, call `validate`, then read values with the
 * `get*` accessors or messages with `getError`. Call `reset` before
 * validating the next input.
 *
 * The accessors throw a ValidatorUsageError when the field is not in the
 * state they expect, so check `isValid()` first.
 */
export class Validator {
	readonly messageRenderer: MessageRenderer;
	private readonly checkers: Checkable[] = [];
	private readonly validData = new Map<string, FieldValue[] | null>();
	private readonly invalidMessages = new Map<string, string>();

	constructor(options: ValidatorOptions = {}) {
		this.messageRenderer = options.renderer ?? defaultRenderer;
	}

	static withRenderer(renderer: MessageRenderer): Validator {
		return new Validator({ renderer });
	}

	/**
	 * Register a checker. Field names must be unique and non-empty.
	 */
	check(checker: Checkable): this {
		if (checker.name === "") {
			throw new ValidatorUsageError("Checker field name must not be empty");
		}
		if (this.checkers.some((c) => c.name === checker.name)) {
			throw new ValidatorUsageError(`Field "${checker.name}" is already registered`);
		}
		this.checkers.push(checker);
		return this;
	}

	/**
	 * Run every checker against `input`, in registration order.
	 * Each field ends up in exactly one of the valid or invalid maps.
	 */
	validate(input: FormInput): void {
		for (const checker of this.checkers) {
			const result = checker.check(input);
			if (result.ok) {
				this.validData.set(checker.name, result.value);
				this.invalidMessages.delete(checker.name);
			} else {
				this.invalidMessages.set(checker.name, renderMessage(this.messageRenderer, result.error));
				this.validData.delete(checker.name);
			}
		}
	}

	/**
	 * Whether every registered field passed the last validation.
	 */
	isValid(): boolean {
		return this.invalidMessages.size === 0 && this.validData.size === this.checkers.length;
	}

	/**
	 * Clear results. Checkers and renderer are kept.
	 */
	reset(): void {
		this.validData.clear();
		this.invalidMessages.clear();
	}

	// ========================================================================
	// Accessors
	// ========================================================================

	getRequired(name: string): FieldValue {
		const values = this.getRequiredMultiple(name);
		if (values.length === 0) {
			throw new ValidatorUsageError(`Field "${name}" has no value`);
		}
		return values[0];
	}

	/**
	 * First value, or undefined when an optional field was not submitted.
	 */
	getOptional(name: string): FieldValue | undefined {
		const values = this.getOptionalMultiple(name);
		return values?.[0];
	}

	getRequiredMultiple(name: string): FieldValue[] {
		const values = this.getOptionalMultiple(name);
		if (values === undefined) {
			throw new ValidatorUsageError(`Field "${name}" was not submitted`);
		}
		return values;
	}

	getOptionalMultiple(name: string): FieldValue[] | undefined {
		const values = this.validData.get(name);
		if (values === undefined) {
			throw new ValidatorUsageError(this.describeMissing(name, "valid"));
		}
		return values === null ? undefined : [...values];
	}

	/** String value of a required field. */
	getStr(name: string): string {
		const value = this.getRequired(name);
		if (value.kind !== "str") {
			throw new ValidatorUsageError(`Field "${name}" is not a string`);
		}
		return value.value;
	}

	/** Integer value of a required field. */
	getI64(name: string): bigint {
		const value = this.getRequired(name);
		if (value.kind !== "i64") {
			throw new ValidatorUsageError(`Field "${name}" is not an integer`);
		}
		return value.value;
	}

	/**
	 * Rendered message of a field that failed validation.
	 */
	getError(name: string): string {
		const message = this.invalidMessages.get(name);
		if (message === undefined) {
			throw new ValidatorUsageError(this.describeMissing(name, "invalid"));
		}
		return message;
	}

	/**
	 * All rendered messages, keyed by field name.
	 */
	errors(): Record<string, string> {
		return Object.fromEntries(this.invalidMessages);
	}

	/**
	 * All valid values, keyed by field name. Optional fields that were not
	 * submitted map to null.
	 */
	data(): Record<string, FieldValue[] | null> {
		const out: Record<string, FieldValue[] | null> = {};
		for (const [name, values] of this.validData) {
			out[name] = values === null ? null : [...values];
		}
		return out;
	}

	private describeMissing(name: string, expected: "valid" | "invalid"): string {
		if (!this.checkers.some((c) => c.name === name)) {
			return `Field "${name}" is not registered`;
		}
		if (expected === "valid" && this.invalidMessages.has(name)) {
			return `Field "${name}" is invalid: ${this.invalidMessages.get(name)}`;
		}
		if (expected === "invalid" && this.validData.has(name)) {
			return `Field "${name}" is valid`;
		}
		return `Field "${name}" has not been validated`;
	}
}
