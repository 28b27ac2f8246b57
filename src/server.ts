import type { Writable } from "node:stream";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError } from "@modelcontextprotocol/sdk/types.js";

import { createMemoryCache } from "./core/cache/memory.js";
import { resolveServiceConfig } from "./core/config.js";
import type { ConvertEvent } from "./core/events.js";
import type { ConversionResult } from "./core/types.js";
import { runHtmlToMarkdownTool, type ToolDeps } from "./tool/run.js";
import { HTML_TO_MARKDOWN_TOOL_NAME, htmlToMarkdownParameters, htmlToMarkdownTool } from "./tool/schema.js";
import { getVersion } from "./utils/version.js";

export const SERVER_NAME = "html2md";

export interface ServerDeps extends ToolDeps {
	/** Warnings and errors are written here. Defaults to process.stderr. */
	stderr?: Writable;

	/** `HTML2MD_CACHE_*` settings for a cache built by `serve`. Defaults to process.env. */
	env?: Record<string, string | undefined>;
}

export function createToolServer(deps: ServerDeps = {}): Server {
	const stderr = deps.stderr ?? process.stderr;
	const server = new Server({ name: SERVER_NAME, version: getVersion() }, { capabilities: { tools: {} } });

	const onEvent = (event: ConvertEvent): void => {
		deps.onEvent?.(event);
		logServerEvent(event, stderr);
	};

	server.setRequestHandler(ListToolsRequestSchema, async () => ({
		tools: [
			{
				name: htmlToMarkdownTool.name,
				description: htmlToMarkdownTool.description,
				inputSchema: {
					type: "object" as const,
					properties: htmlToMarkdownParameters.properties,
					required: htmlToMarkdownParameters.required,
				},
			},
		],
	}));

	server.setRequestHandler(CallToolRequestSchema, async (request) => {
		if (request.params.name !== HTML_TO_MARKDOWN_TOOL_NAME) {
			throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${request.params.name}`);
		}
		const response = await runHtmlToMarkdownTool(request.params.arguments ?? {}, { ...deps, onEvent });
		return { content: response.content, isError: response.isError };
	});

	return server;
}

/**
 * Serve the tool on `transport`. Without `deps.cache`, a result cache is built
 * from `HTML2MD_CACHE_*` settings and disposed when the connection closes; a
 * supplied cache stays the caller's to dispose.
 */
export async function serve(transport: Transport, deps: ServerDeps = {}): Promise<Server> {
	const ownedCache = deps.cache
		? undefined
		: createMemoryCache<ConversionResult>(resolveServiceConfig(deps.env).cache);
	const server = createToolServer({ ...deps, cache: deps.cache ?? ownedCache });
	if (ownedCache) {
		server.onclose = () => {
			ownedCache.dispose();
		};
	}
	await server.connect(transport);
	return server;
}

export async function serveStdio(deps: ServerDeps = {}): Promise<Server> {
	return await serve(new StdioServerTransport(), deps);
}

function logServerEvent(event: ConvertEvent, stderr: Writable): void {
	switch (event.type) {
		case "start":
			stderr.write(`[html2md] Processing request for URL: ${event.url}\n`);
			break;
		case "warning":
			stderr.write(`[html2md] warning: ${event.message}\n`);
			break;
		case "error":
			stderr.write(`[html2md] error: ${event.error.message}\n`);
			break;
		case "complete":
			stderr.write(`[html2md] Converted ${event.result.url}${event.cached ? " (cached)" : ""}\n`);
			break;
		default:
			break;
	}
}
