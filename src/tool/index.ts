export { renderConversion, renderSummary } from "./render.js";
export { runHtmlToMarkdownTool, type ToolDeps, type ToolResponse, toConvertOptions, validateParams } from "./run.js";
export {
	HTML_TO_MARKDOWN_TOOL_NAME,
	type HtmlToMarkdownParams,
	htmlToMarkdownParameters,
	htmlToMarkdownTool,
} from "./schema.js";
