export class Html2MdError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "Html2MdError";
	}
}

export class ConfigurationError extends Html2MdError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ConfigurationError";
	}
}

export interface ArgumentErrorDetail {
	path: string;
	message: string;
}

export class InvalidArgumentsError extends Html2MdError {
	public readonly errors: ArgumentErrorDetail[];

	constructor(message: string, errors: ArgumentErrorDetail[] = [], options?: { cause?: unknown }) {
		super(message, options);
		this.name = "InvalidArgumentsError";
		this.errors = errors;
	}
}

export class FetchError extends Html2MdError {
	public readonly url: string;
	public readonly statusCode?: number;

	constructor(message: string, url: string, statusCode?: number, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "FetchError";
		this.url = url;
		this.statusCode = statusCode;
	}
}

export class ParseError extends Html2MdError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ParseError";
	}
}

export class SectionNotFoundError extends ParseError {
	public readonly section: string;

	constructor(section: string) {
		super(`Section not found: ${section}`);
		this.name = "SectionNotFoundError";
		this.section = section;
	}
}

export class AbortError extends Html2MdError {
	constructor(message: string = "Conversion aborted") {
		super(message);
		this.name = "AbortError";
	}
}
