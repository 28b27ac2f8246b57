import type { BrowserName, ConversionResult, FetchMethod } from "./types.js";

export type ConvertEvent =
	// Lifecycle
	| StartEvent
	| CompleteEvent
	| ErrorEvent
	// Warnings
	| WarningEvent
	// Cache
	| CacheHitEvent
	| CacheMissEvent
	| CacheSetEvent
	// Pipeline
	| FetchStartEvent
	| FetchEndEvent
	| SectionExtractedEvent
	| CleanEndEvent
	| ConvertEndEvent;

export interface StartEvent {
	type: "start";
	url: string;
}

export interface CompleteEvent {
	type: "complete";
	result: ConversionResult;
	cached: boolean;
}

export interface ErrorEvent {
	type: "error";
	error: Error;
}

export interface WarningEvent {
	type: "warning";
	code: "profile_unsupported";
	message: string;
}

export interface CacheHitEvent {
	type: "cache_hit";
	key: string;
	age: number;
}

export interface CacheMissEvent {
	type: "cache_miss";
	key: string;
}

export interface CacheSetEvent {
	type: "cache_set";
	key: string;
	ttlMs: number;
}

export interface FetchStartEvent {
	type: "fetch_start";
	method: FetchMethod;
	browser?: BrowserName;
}

export interface FetchEndEvent {
	type: "fetch_end";
	method: FetchMethod;
	bytes: number;
}

export interface SectionExtractedEvent {
	type: "section_extracted";
	section: string;
	bytes: number;
}

export interface CleanEndEvent {
	type: "clean_end";
	bytes: number;
}

export interface ConvertEndEvent {
	type: "convert_end";
	bytes: number;
}
