/**
 * Client configuration: validation, defaults and environment loading.
 */

import { z } from "zod";
import { GenAIError } from "./errors.js";
import { LOG_LEVELS, type Logger, createLogger } from "./logger.js";
import type { GenAIConfig } from "./types.js";

export const DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com";
export const DEFAULT_API_VERSION = "v1beta";
export const DEFAULT_TIMEOUT_MS = 120_000;

/**
 * Config with every default filled in (internal).
 */
export interface ResolvedConfig extends GenAIConfig {
	readonly baseUrl: string;
	readonly apiVersion: string;
	readonly timeout: number;
	readonly logger: Logger;
}

/**
 * Validates config parameters before making requests.
 * @throws {GenAIError} with code 'INVALID_CONFIG' if config is invalid
 */
export function validateConfig(config: GenAIConfig): void {
	if (!config.apiKey) {
		throw new GenAIError("apiKey is required", "INVALID_CONFIG");
	}
	if (!config.model) {
		throw new GenAIError("model is required", "INVALID_CONFIG");
	}
	if (
		config.timeout !== undefined &&
		(!Number.isFinite(config.timeout) || config.timeout <= 0)
	) {
		throw new GenAIError("timeout must be a positive number", "INVALID_CONFIG");
	}
	if (config.baseUrl !== undefined && !isUrl(config.baseUrl)) {
		throw new GenAIError(
			`baseUrl is not a valid URL: ${config.baseUrl}`,
			"INVALID_CONFIG",
		);
	}
	for (const tool of config.tools ?? []) {
		const threshold =
			tool.googleSearchRetrieval?.dynamicRetrievalConfig?.dynamicThreshold;
		if (threshold !== undefined && !(threshold >= 0 && threshold <= 1)) {
			throw new GenAIError(
				"dynamicThreshold must be between 0 and 1",
				"INVALID_CONFIG",
			);
		}
	}
}

function isUrl(value: string): boolean {
	try {
		new URL(value);
		return true;
	} catch {
		return false;
	}
}

/**
 * Validates `config` and fills in defaults.
 */
export function resolveConfig(config: GenAIConfig): ResolvedConfig {
	validateConfig(config);
	return {
		...config,
		baseUrl: (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
		apiVersion: config.apiVersion ?? DEFAULT_API_VERSION,
		timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
		logger: config.logger ?? createLogger(),
	};
}

const EnvSchema = z.object({
	GENWIRE_API_KEY: z.string().min(1, "GENWIRE_API_KEY is required"),
	GENWIRE_MODEL: z.string().min(1, "GENWIRE_MODEL is required"),
	GENWIRE_BASE_URL: z.string().url().optional(),
	GENWIRE_API_VERSION: z.string().min(1).optional(),
	GENWIRE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
	GENWIRE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

/**
 * Builds a config from `GENWIRE_*` environment variables.
 *
 * @param env - Variables to read (default `process.env`)
 * @throws {GenAIError} with code 'INVALID_CONFIG' naming every invalid variable
 */
export function loadConfigFromEnv(
	env: Record<string, string | undefined> = process.env,
): GenAIConfig {
	// Empty strings count as unset
	const present = Object.fromEntries(
		Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
	);
	const result = EnvSchema.safeParse(present);
	if (!result.success) {
		const problems = result.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new GenAIError(`Invalid environment: ${problems}`, "INVALID_CONFIG");
	}

	const vars = result.data;
	return {
		apiKey: vars.GENWIRE_API_KEY,
		model: vars.GENWIRE_MODEL,
		baseUrl: vars.GENWIRE_BASE_URL,
		apiVersion: vars.GENWIRE_API_VERSION,
		timeout: vars.GENWIRE_TIMEOUT_MS,
		logger: vars.GENWIRE_LOG_LEVEL
			? createLogger(vars.GENWIRE_LOG_LEVEL)
			: undefined,
	};
}
