import { toResult, type ParseResult } from "./errors.js";
import { parseTemplate, parseTemplateFile } from "./template.js";
import type { HTMLTemplate, TemplateFile } from "./types.js";

export * from "./types.js";
export * from "./cursor.js";
export * from "./errors.js";
export * from "./primitives.js";
export * from "./expression.js";
export * from "./attributes.js";
export * from "./elements.js";
export * from "./control.js";
export * from "./calls.js";
export * from "./nodes.js";
export * from "./template.js";
export * from "./validator.js";
export * from "./html.js";
export { debug, configureDebug, refreshDebugChannels, isDebugEnabled } from "./debug.js";
export type { DebugChannel, DebugConfig, DebugData } from "./debug.js";

export function tryParseTemplate(source: string): ParseResult<HTMLTemplate> {
  return toResult(() => parseTemplate(source));
}

export function tryParseTemplateFile(source: string): ParseResult<TemplateFile> {
  return toResult(() => parseTemplateFile(source));
}
