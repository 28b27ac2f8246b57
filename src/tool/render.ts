import { Environment } from "minijinja-js";

import { Html2MdError } from "../core/errors.js";
import { compressionPercent, type ConversionSummary } from "../core/summary.js";
import type { ConversionResult } from "../core/types.js";
import { formatBytes, formatCount } from "../utils/helpers.js";

const TOC_SHOWN = 20;

const SUCCESS_TEMPLATE = `# Conversion Successful

**URL:** {{ url }}
**Original Size:** {{ original_size }}
**Markdown Size:** {{ markdown_size }}
**Estimated Tokens:** {{ estimated_tokens }}
**Compression:** {{ compression }}
{%- if section %}
**Section extracted:** {{ section }}
{%- endif %}

---

{{ markdown }}
`;

const SUMMARY_TEMPLATE = `# Document Too Large - Summary Returned

**URL:** {{ url }}
**Full content saved to:** \`{{ saved_to }}\`

## Statistics
- **Original HTML:** {{ stats.original_human }} ({{ stats.original_bytes }} bytes)
- **Cleaned HTML:** {{ stats.cleaned_human }} ({{ stats.cleaned_bytes }} bytes)
- **Markdown:** {{ stats.markdown_human }} ({{ stats.markdown_bytes }} bytes)
- **Estimated tokens:** {{ stats.estimated_tokens }}
- **Compression:** {{ stats.compression_percent }} ({{ stats.compression_ratio }})

## Table of Contents
{%- for heading in toc %}
{{ heading }}
{%- endfor %}
{%- if hidden_headings > 0 %}
... and {{ hidden_headings }} more headings
{%- endif %}

## Preview (first 500 words)
{{ preview }}

---

{{ help }}
`;

function render(template: string, context: Record<string, unknown>): string {
	const env = new Environment();
	try {
		return env.renderStr(template, context);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Html2MdError(`Template rendering failed: ${message}`, { cause: error });
	}
}

export function renderConversion(result: ConversionResult): string {
	return render(SUCCESS_TEMPLATE, {
		url: result.url,
		original_size: formatBytes(result.originalSize),
		markdown_size: formatBytes(result.markdownSize),
		estimated_tokens: formatCount(result.estimatedTokens),
		compression: `${compressionPercent(result.originalSize, result.markdownSize).toFixed(1)}%`,
		section: result.section,
		markdown: result.markdown,
	});
}

export function renderSummary(summary: ConversionSummary): string {
	const { statistics, tableOfContents } = summary;
	return render(SUMMARY_TEMPLATE, {
		url: summary.url,
		saved_to: summary.savedTo,
		stats: {
			original_human: statistics.originalSizeHuman,
			original_bytes: formatCount(statistics.originalSizeBytes),
			cleaned_human: statistics.cleanedSizeHuman,
			cleaned_bytes: formatCount(statistics.cleanedSizeBytes),
			markdown_human: statistics.markdownSizeHuman,
			markdown_bytes: formatCount(statistics.markdownSizeBytes),
			estimated_tokens: formatCount(statistics.estimatedTokens),
			compression_percent: statistics.compressionPercent,
			compression_ratio: statistics.compressionRatio,
		},
		toc: tableOfContents.slice(0, TOC_SHOWN),
		hidden_headings: Math.max(0, tableOfContents.length - TOC_SHOWN),
		preview: summary.preview,
		help: summary.help,
	});
}
