import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

export type SizingBasis = "cost" | "mark";
export type OversellPolicy = "clamp" | "reject";

export interface RiskConfig {
	/** Fractional drawdown from the first equity point that halts trading. */
	maxDailyLossPct: number;
	/** Largest single order as a fraction of marked equity. */
	maxPositionPct: number;
}

export interface AccountConfig {
	startingBalance: number;
}

export interface EngineConfig {
	sizingFraction: number;
	sizingBasis: SizingBasis;
	feeRate: number;
	slippagePct: number;
	slippageAbs: number;
	oversellPolicy: OversellPolicy;
}

export interface LiveConfig {
	exchangeId: string;
	symbol: string;
	timeframe: string;
	pollIntervalMs: number;
	reconnectDelayMs: number;
	maxReconnectAttempts: number;
	queueCapacity: number;
	feeRate: number;
	latencyMs: number;
	syntheticFallback: boolean;
}

export interface StrategyConfig {
	id: string;
	[key: string]: unknown;
}

export interface EnvConfig {
	exchangeId?: string;
	defaultSymbol?: string;
	defaultTimeframe?: string;
	configDir?: string;
}

export interface SimulationConfig {
	env: EnvConfig;
	risk: RiskConfig;
	account: AccountConfig;
	engine: EngineConfig;
	live: LiveConfig;
	strategy: StrategyConfig;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	riskProfile?: string;
	accountProfile?: string;
	engineProfile?: string;
	liveProfile?: string;
	strategyProfile?: string;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	sizingFraction: 0.01,
	sizingBasis: "cost",
	feeRate: 0,
	slippagePct: 0,
	slippageAbs: 0,
	oversellPolicy: "clamp",
};

type JsonRecord = Record<string, unknown>;

let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const isRecord = (value: unknown): value is JsonRecord =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (!fs.existsSync(path.join(current, "config", "risk"))) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readJsonRecord = (filePath: string): JsonRecord => {
	if (!fs.existsSync(filePath)) {
		throw new Error(`Config file not found: ${filePath}`);
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	if (!isRecord(parsed)) {
		throw new Error(`Config file ${filePath} must contain a JSON object`);
	}
	return parsed;
};

const requireNumber = (file: JsonRecord, field: string, label: string): number => {
	const value = file[field];
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new Error(`Required numeric field missing in ${label}.${field}`);
	}
	return value;
};

const optionalNumber = (
	file: JsonRecord,
	field: string,
	label: string,
	fallback: number
): number => (file[field] === undefined ? fallback : requireNumber(file, field, label));

const optionalString = (
	file: JsonRecord,
	field: string,
	label: string,
	fallback: string
): string => {
	const value = file[field];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "string" || !value.trim()) {
		throw new Error(`Field ${label}.${field} must be a non-empty string`);
	}
	return value.trim();
};

const optionalChoice = <T extends string>(
	file: JsonRecord,
	field: string,
	label: string,
	choices: readonly T[],
	fallback: T
): T => {
	const value = file[field];
	if (value === undefined) {
		return fallback;
	}
	const match = choices.find((choice) => choice === value);
	if (!match) {
		throw new Error(
			`Field ${label}.${field} must be one of ${choices.join(", ")}; got ${String(value)}`
		);
	}
	return match;
};

const profilePath = (configDir: string, kind: string, profile: string): string =>
	path.join(
		configDir,
		kind,
		profile.endsWith(".json") ? profile : `${profile}.json`
	);

export const getDefaultConfigDir = (): string =>
	readOptionalEnvVar("BARSIM_CONFIG_DIR") ??
	path.join(findWorkspaceRoot(), "config");

export const loadEnvConfig = (
	envPath = path.join(findWorkspaceRoot(), ".env")
): EnvConfig => {
	if (loadedEnvPath !== envPath && fs.existsSync(envPath)) {
		dotenv.config({ path: envPath });
		loadedEnvPath = envPath;
	}

	return {
		exchangeId: readOptionalEnvVar("EXCHANGE_ID"),
		defaultSymbol: readOptionalEnvVar("DEFAULT_SYMBOL"),
		defaultTimeframe: readOptionalEnvVar("DEFAULT_TIMEFRAME"),
		configDir: readOptionalEnvVar("BARSIM_CONFIG_DIR"),
	};
};

export const loadRiskConfig = (
	configDir = getDefaultConfigDir(),
	riskProfile = "default"
): RiskConfig => {
	const file = readJsonRecord(profilePath(configDir, "risk", riskProfile));
	const config: RiskConfig = {
		maxDailyLossPct: requireNumber(file, "maxDailyLossPct", "risk"),
		maxPositionPct: requireNumber(file, "maxPositionPct", "risk"),
	};
	if (config.maxDailyLossPct <= 0 || config.maxDailyLossPct > 1) {
		throw new Error("risk.maxDailyLossPct must be within (0, 1]");
	}
	if (config.maxPositionPct <= 0) {
		throw new Error("risk.maxPositionPct must be positive");
	}
	return config;
};

export const loadAccountConfig = (
	configDir = getDefaultConfigDir(),
	accountProfile = "paper"
): AccountConfig => {
	const file = readJsonRecord(profilePath(configDir, "account", accountProfile));
	return {
		startingBalance: requireNumber(file, "startingBalance", "account"),
	};
};

export const loadEngineConfig = (
	configDir = getDefaultConfigDir(),
	engineProfile = "default"
): EngineConfig => {
	const file = readJsonRecord(profilePath(configDir, "engine", engineProfile));
	const defaults = DEFAULT_ENGINE_CONFIG;
	return {
		sizingFraction: optionalNumber(
			file,
			"sizingFraction",
			"engine",
			defaults.sizingFraction
		),
		sizingBasis: optionalChoice(
			file,
			"sizingBasis",
			"engine",
			["cost", "mark"],
			defaults.sizingBasis
		),
		feeRate: optionalNumber(file, "feeRate", "engine", defaults.feeRate),
		slippagePct: optionalNumber(
			file,
			"slippagePct",
			"engine",
			defaults.slippagePct
		),
		slippageAbs: optionalNumber(
			file,
			"slippageAbs",
			"engine",
			defaults.slippageAbs
		),
		oversellPolicy: optionalChoice(
			file,
			"oversellPolicy",
			"engine",
			["clamp", "reject"],
			defaults.oversellPolicy
		),
	};
};

export const loadLiveConfig = (
	configDir = getDefaultConfigDir(),
	env: EnvConfig = {},
	liveProfile = "default"
): LiveConfig => {
	const file = readJsonRecord(profilePath(configDir, "live", liveProfile));
	const syntheticFallback = file.syntheticFallback;
	return {
		exchangeId:
			env.exchangeId ?? optionalString(file, "exchangeId", "live", "binance"),
		symbol: env.defaultSymbol ?? optionalString(file, "symbol", "live", "BTC/USDT"),
		timeframe:
			env.defaultTimeframe ?? optionalString(file, "timeframe", "live", "1m"),
		pollIntervalMs: optionalNumber(file, "pollIntervalMs", "live", 10_000),
		reconnectDelayMs: optionalNumber(file, "reconnectDelayMs", "live", 5_000),
		maxReconnectAttempts: optionalNumber(
			file,
			"maxReconnectAttempts",
			"live",
			5
		),
		queueCapacity: optionalNumber(file, "queueCapacity", "live", 64),
		feeRate: optionalNumber(file, "feeRate", "live", 0.0005),
		latencyMs: optionalNumber(file, "latencyMs", "live", 0),
		syntheticFallback:
			typeof syntheticFallback === "boolean" ? syntheticFallback : true,
	};
};

export const loadStrategyConfig = (
	configDir = getDefaultConfigDir(),
	strategyProfile = "sma-cross"
): StrategyConfig => {
	const strategyPath = profilePath(configDir, "strategy", strategyProfile);
	const file = readJsonRecord(strategyPath);
	const id = file.id;
	if (typeof id !== "string" || !id) {
		throw new Error(
			`Strategy config at ${strategyPath} must include an "id" property.`
		);
	}
	return { ...file, id };
};

export const loadSimulationConfig = (
	options: ConfigLoadOptions = {}
): SimulationConfig => {
	const env = loadEnvConfig(options.envPath);
	const configDir =
		options.configDir ?? env.configDir ?? path.join(findWorkspaceRoot(), "config");
	return {
		env,
		risk: loadRiskConfig(configDir, options.riskProfile),
		account: loadAccountConfig(configDir, options.accountProfile),
		engine: loadEngineConfig(configDir, options.engineProfile),
		live: loadLiveConfig(configDir, env, options.liveProfile),
		strategy: loadStrategyConfig(configDir, options.strategyProfile),
	};
};
