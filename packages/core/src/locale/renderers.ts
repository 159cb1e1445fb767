import type { Message, SomeMessage } from "../types";
import { MESSAGE_KINDS } from "../types";
import type { MessageRenderer, MessageTemplate, MessageTemplates } from "./types";

// ============================================================================
// Built-in Templates
// ============================================================================

const zhTemplates: MessageTemplates = {
	[MESSAGE_KINDS.MAX]: (title, rule) => `${title}不能大于${rule}`,
	[MESSAGE_KINDS.MIN]: (title, rule) => `${title}不能小于${rule}`,
	[MESSAGE_KINDS.MAX_LEN]: (title, rule) => `${title}长度不能大于${rule}`,
	[MESSAGE_KINDS.MIN_LEN]: (title, rule) => `${title}长度不能小于${rule}`,
	[MESSAGE_KINDS.BLANK]: (title) => `${title}不能为空`,
	[MESSAGE_KINDS.FORMAT]: (title) => `${title}格式不正确`,
};

const enTemplates: MessageTemplates = {
	[MESSAGE_KINDS.MAX]: (title, rule) => `${title} can't be more than ${rule}`,
	[MESSAGE_KINDS.MIN]: (title, rule) => `${title} can't be less than ${rule}`,
	[MESSAGE_KINDS.MAX_LEN]: (title, rule) => `${title} can't be longer than ${rule}`,
	[MESSAGE_KINDS.MIN_LEN]: (title, rule) => `${title} can't be shorter than ${rule}`,
	[MESSAGE_KINDS.BLANK]: (title) => `${title} is missing`,
	[MESSAGE_KINDS.FORMAT]: (title) => `${title} is in wrong format`,
};

// ============================================================================
// Renderer Construction
// ============================================================================

class TemplateRenderer implements MessageRenderer {
	private readonly templates: MessageTemplates;

	constructor(templates: MessageTemplates) {
		this.templates = templates;
	}

	renderMessage(message: Readonly<SomeMessage>): string {
		const template: MessageTemplate = this.templates[message.kind];
		return template(message.title, message.ruleValues[0] ?? "", message);
	}
}

/**
 * Default renderer, producing Chinese messages such as `年龄不能小于18`.
 */
export const defaultRenderer: MessageRenderer = new TemplateRenderer(zhTemplates);

/**
 * English renderer, e.g. `age can't be less than 18`.
 */
export const englishRenderer: MessageRenderer = new TemplateRenderer(enTemplates);

/**
 * Build a renderer from per-kind templates.
 * Kinds without a template use the default (Chinese) wording.
 */
export function createRenderer(templates: Partial<MessageTemplates>): MessageRenderer {
	return new TemplateRenderer({ ...zhTemplates, ...templates });
}

/**
 * Render a message to display text.
 * Literal messages skip the renderer and come back unchanged.
 */
export function renderMessage(renderer: MessageRenderer, message: Message): string {
	if (message.kind === "any") {
		return message.text;
	}
	return renderer.renderMessage(message.detail);
}
