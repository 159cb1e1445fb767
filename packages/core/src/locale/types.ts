import type { MessageKind, SomeMessage } from "../types";

// ============================================================================
// Renderer Types
// ============================================================================

/**
 * Turns a validation failure into the text shown to the user.
 * Pass a different renderer to a Validator to change the message language.
 */
export interface MessageRenderer {
	renderMessage(message: Readonly<SomeMessage>): string;
}

/**
 * Formats one kind of message.
 * `rule` is the first rule parameter (the bound of a max/min rule), or an
 * empty string for kinds that carry none.
 */
export type MessageTemplate = (title: string, rule: string, message: Readonly<SomeMessage>) => string;

/**
 * Per-kind templates for building a renderer.
 */
export type MessageTemplates = Record<MessageKind, MessageTemplate>;
