// Types
export type { MessageRenderer, MessageTemplate, MessageTemplates } from "./types";

// Renderers
export { defaultRenderer, englishRenderer, createRenderer, renderMessage } from "./renderers";
