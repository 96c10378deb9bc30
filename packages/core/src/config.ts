import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigurationError } from "./errors";
import { DEFAULT_STRATEGY_ID, isStrategyId } from "./strategies/ids";
import { timeframeToMs } from "./time/time";

export interface SessionConfig {
	enabled: boolean;
	/** First trading hour, UTC, inclusive. */
	start: number;
	/** Session end hour, UTC, exclusive. */
	end: number;
	/** Open positions are force-closed from `end - closeLeadHours` onwards. */
	closeLeadHours: number;
}

interface StrategyConfigBase {
	symbols: string[];
	timeframe: string;
	historyBars: number;
	session: SessionConfig;
}

export interface BreakoutParams {
	entryPeriod: number;
	exitPeriod: number;
	atrPeriod: number;
	useVolFilter: boolean;
	volLookback: number;
	volThreshold: number;
	useTrendFilter: boolean;
	trendPeriod: number;
	profitMultiplier: number;
}

export interface CrossoverParams {
	fastEma: number;
	slowEma: number;
	signalEma: number;
	rsiPeriod: number;
	atrPeriod: number;
	atrMultiplier: number;
	profitMultiplier: number;
}

export interface BreakoutStrategyConfig extends StrategyConfigBase, BreakoutParams {
	id: "breakout";
}

export interface CrossoverStrategyConfig
	extends StrategyConfigBase,
		CrossoverParams {
	id: "crossover";
}

export type StrategyConfig = BreakoutStrategyConfig | CrossoverStrategyConfig;

export interface RiskConfig {
	riskPerTrade: number;
	maxDailyLoss: number;
	maxPositions: number;
	maxCorrelated: number;
	pipValueBySymbolType: Record<string, number>;
	symbolTypeBySymbol: Record<string, string>;
	correlationGroups: string[][];
	minLot: number;
	maxLot: number;
}

export type ExecutionMode = "paper" | "live";

export interface EnvConfig {
	executionMode: ExecutionMode;
	exchangeId: string;
	strategyId?: string;
	pollIntervalMs: number;
	startingBalance: number;
	accountCurrency: string;
}

export interface FxdeskConfig {
	env: EnvConfig;
	strategy: StrategyConfig;
	risk: RiskConfig;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	strategyProfile?: string;
	riskProfile?: string;
}

export type ConfigSourceType = "file" | "embedded";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

export const DEFAULT_BREAKOUT_PARAMS: BreakoutParams = {
	entryPeriod: 20,
	exitPeriod: 10,
	atrPeriod: 14,
	useVolFilter: true,
	volLookback: 100,
	volThreshold: 1.2,
	useTrendFilter: true,
	trendPeriod: 200,
	profitMultiplier: 2,
};

export const DEFAULT_CROSSOVER_PARAMS: CrossoverParams = {
	fastEma: 9,
	slowEma: 21,
	signalEma: 5,
	rsiPeriod: 14,
	atrPeriod: 14,
	atrMultiplier: 2,
	profitMultiplier: 3,
};

export const DEFAULT_SESSION: SessionConfig = {
	enabled: false,
	start: 8,
	end: 16,
	closeLeadHours: 1,
};

export const DEFAULT_RISK_CONFIG: RiskConfig = {
	riskPerTrade: 0.01,
	maxDailyLoss: 0.05,
	maxPositions: 5,
	maxCorrelated: 2,
	pipValueBySymbolType: {},
	symbolTypeBySymbol: {},
	correlationGroups: [],
	minLot: 0.01,
	maxLot: 10,
};

const configMetadata = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	configMetadata.set(config, { ...configMetadata.get(config), ...metadata });
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null =>
	configMetadata.get(config) ?? null;

let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = ["package-lock.json", ".git"];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
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

const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

type RawRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is RawRecord =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonFile = (filePath: string): RawRecord => {
	if (!fs.existsSync(filePath)) {
		throw new ConfigurationError(`Config file not found: ${filePath}`);
	}
	const contents = fs.readFileSync(filePath, "utf-8");
	let parsed: unknown;
	try {
		parsed = JSON.parse(contents);
	} catch (error) {
		throw new ConfigurationError(
			`Config file ${filePath} is not valid JSON: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
	if (!isRecord(parsed)) {
		throw new ConfigurationError(`Config file ${filePath} must hold an object`);
	}
	return parsed;
};

const readNumber = (
	raw: RawRecord,
	key: string,
	fallback: number,
	scope: string
): number => {
	const value = raw[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigurationError(
			`${scope}.${key} must be a finite number`,
			`${scope}.${key}`
		);
	}
	return value;
};

const readBoolean = (
	raw: RawRecord,
	key: string,
	fallback: boolean,
	scope: string
): boolean => {
	const value = raw[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "boolean") {
		throw new ConfigurationError(
			`${scope}.${key} must be a boolean`,
			`${scope}.${key}`
		);
	}
	return value;
};

const readString = (
	raw: RawRecord,
	key: string,
	fallback: string,
	scope: string
): string => {
	const value = raw[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "string" || !value.trim()) {
		throw new ConfigurationError(
			`${scope}.${key} must be a non-empty string`,
			`${scope}.${key}`
		);
	}
	return value.trim();
};

const readStringArray = (raw: unknown, field: string): string[] => {
	if (
		!Array.isArray(raw) ||
		!raw.every((item): item is string => typeof item === "string")
	) {
		throw new ConfigurationError(`${field} must be a list of strings`, field);
	}
	return raw.map((item) => item.trim().toUpperCase());
};

const readNumberMap = (raw: unknown, field: string): Record<string, number> => {
	if (raw === undefined) {
		return {};
	}
	if (!isRecord(raw)) {
		throw new ConfigurationError(`${field} must be an object`, field);
	}
	const result: Record<string, number> = {};
	for (const [key, value] of Object.entries(raw)) {
		if (typeof value !== "number" || !(value > 0)) {
			throw new ConfigurationError(
				`${field}.${key} must be a positive number`,
				`${field}.${key}`
			);
		}
		result[key] = value;
	}
	return result;
};

const readStringMap = (raw: unknown, field: string): Record<string, string> => {
	if (raw === undefined) {
		return {};
	}
	if (!isRecord(raw)) {
		throw new ConfigurationError(`${field} must be an object`, field);
	}
	const result: Record<string, string> = {};
	for (const [key, value] of Object.entries(raw)) {
		if (typeof value !== "string") {
			throw new ConfigurationError(
				`${field}.${key} must be a string`,
				`${field}.${key}`
			);
		}
		result[key.toUpperCase()] = value;
	}
	return result;
};

const assertPositiveInteger = (value: number, field: string): void => {
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigurationError(
			`${field} must be a positive integer, got ${value}`,
			field
		);
	}
};

const assertPositive = (value: number, field: string): void => {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigurationError(`${field} must be positive, got ${value}`, field);
	}
};

const assertFraction = (value: number, field: string): void => {
	if (!Number.isFinite(value) || value <= 0 || value >= 1) {
		throw new ConfigurationError(
			`${field} must be between 0 and 1 (exclusive), got ${value}`,
			field
		);
	}
};

export const validateSessionConfig = (session: SessionConfig): void => {
	const { start, end, closeLeadHours } = session;
	if (
		!Number.isInteger(start) ||
		!Number.isInteger(end) ||
		start < 0 ||
		end > 24 ||
		start >= end
	) {
		throw new ConfigurationError(
			`session must satisfy 0 <= start < end <= 24, got ${start}-${end}`,
			"session"
		);
	}
	if (!Number.isInteger(closeLeadHours) || closeLeadHours < 0) {
		throw new ConfigurationError(
			`session.closeLeadHours must be a non-negative integer, got ${closeLeadHours}`,
			"session.closeLeadHours"
		);
	}
};

export const validateBreakoutParams = (params: BreakoutParams): void => {
	assertPositiveInteger(params.entryPeriod, "entryPeriod");
	assertPositiveInteger(params.exitPeriod, "exitPeriod");
	assertPositiveInteger(params.atrPeriod, "atrPeriod");
	assertPositiveInteger(params.volLookback, "volLookback");
	assertPositiveInteger(params.trendPeriod, "trendPeriod");
	assertPositive(params.volThreshold, "volThreshold");
	assertPositive(params.profitMultiplier, "profitMultiplier");
};

export const validateCrossoverParams = (params: CrossoverParams): void => {
	assertPositiveInteger(params.fastEma, "fastEma");
	assertPositiveInteger(params.slowEma, "slowEma");
	assertPositiveInteger(params.signalEma, "signalEma");
	assertPositiveInteger(params.rsiPeriod, "rsiPeriod");
	assertPositiveInteger(params.atrPeriod, "atrPeriod");
	assertPositive(params.atrMultiplier, "atrMultiplier");
	assertPositive(params.profitMultiplier, "profitMultiplier");
	if (params.fastEma >= params.slowEma) {
		throw new ConfigurationError(
			`fastEma (${params.fastEma}) must be shorter than slowEma (${params.slowEma})`,
			"fastEma"
		);
	}
};

export const validateRiskConfig = (risk: RiskConfig): void => {
	assertFraction(risk.riskPerTrade, "risk.riskPerTrade");
	assertFraction(risk.maxDailyLoss, "risk.maxDailyLoss");
	assertPositiveInteger(risk.maxPositions, "risk.maxPositions");
	assertPositiveInteger(risk.maxCorrelated, "risk.maxCorrelated");
	assertPositive(risk.minLot, "risk.minLot");
	assertPositive(risk.maxLot, "risk.maxLot");
	if (risk.minLot > risk.maxLot) {
		throw new ConfigurationError(
			`risk.minLot (${risk.minLot}) exceeds risk.maxLot (${risk.maxLot})`,
			"risk.minLot"
		);
	}
};

const parseSession = (raw: unknown): SessionConfig => {
	if (raw === undefined) {
		return { ...DEFAULT_SESSION };
	}
	if (!isRecord(raw)) {
		throw new ConfigurationError("strategy.session must be an object", "session");
	}
	const session: SessionConfig = {
		enabled: readBoolean(raw, "enabled", true, "session"),
		start: readNumber(raw, "start", DEFAULT_SESSION.start, "session"),
		end: readNumber(raw, "end", DEFAULT_SESSION.end, "session"),
		closeLeadHours: readNumber(
			raw,
			"closeLeadHours",
			DEFAULT_SESSION.closeLeadHours,
			"session"
		),
	};
	validateSessionConfig(session);
	return session;
};

const parseStrategyBase = (raw: RawRecord): StrategyConfigBase => {
	const timeframe = readString(raw, "timeframe", "4h", "strategy");
	try {
		timeframeToMs(timeframe);
	} catch (error) {
		throw new ConfigurationError(
			error instanceof Error ? error.message : String(error),
			"strategy.timeframe"
		);
	}
	const symbols = readStringArray(raw.symbols ?? ["EURUSD"], "strategy.symbols");
	if (!symbols.length) {
		throw new ConfigurationError(
			"strategy.symbols must list at least one symbol",
			"strategy.symbols"
		);
	}
	const historyBars = readNumber(raw, "historyBars", 300, "strategy");
	assertPositiveInteger(historyBars, "strategy.historyBars");
	return {
		symbols,
		timeframe,
		historyBars,
		session: parseSession(raw.session),
	};
};

/**
 * Turns a raw JSON object into a validated strategy config. Missing tuning
 * keys take the documented defaults; present keys must be well-formed.
 */
export const parseStrategyConfig = (raw: unknown): StrategyConfig => {
	if (!isRecord(raw)) {
		throw new ConfigurationError("strategy config must be an object");
	}
	const id = raw.id;
	if (typeof id !== "string") {
		throw new ConfigurationError(
			'strategy config must include an "id" property',
			"strategy.id"
		);
	}
	if (!isStrategyId(id)) {
		throw new ConfigurationError(`Unknown strategy id: ${id}`, "strategy.id");
	}
	const base = parseStrategyBase(raw);

	if (id === "breakout") {
		const d = DEFAULT_BREAKOUT_PARAMS;
		const config: BreakoutStrategyConfig = {
			id,
			...base,
			entryPeriod: readNumber(raw, "entryPeriod", d.entryPeriod, "strategy"),
			exitPeriod: readNumber(raw, "exitPeriod", d.exitPeriod, "strategy"),
			atrPeriod: readNumber(raw, "atrPeriod", d.atrPeriod, "strategy"),
			useVolFilter: readBoolean(raw, "useVolFilter", d.useVolFilter, "strategy"),
			volLookback: readNumber(raw, "volLookback", d.volLookback, "strategy"),
			volThreshold: readNumber(raw, "volThreshold", d.volThreshold, "strategy"),
			useTrendFilter: readBoolean(
				raw,
				"useTrendFilter",
				d.useTrendFilter,
				"strategy"
			),
			trendPeriod: readNumber(raw, "trendPeriod", d.trendPeriod, "strategy"),
			profitMultiplier: readNumber(
				raw,
				"profitMultiplier",
				d.profitMultiplier,
				"strategy"
			),
		};
		validateBreakoutParams(config);
		return config;
	}

	const d = DEFAULT_CROSSOVER_PARAMS;
	const config: CrossoverStrategyConfig = {
		id,
		...base,
		fastEma: readNumber(raw, "fastEma", d.fastEma, "strategy"),
		slowEma: readNumber(raw, "slowEma", d.slowEma, "strategy"),
		signalEma: readNumber(raw, "signalEma", d.signalEma, "strategy"),
		rsiPeriod: readNumber(raw, "rsiPeriod", d.rsiPeriod, "strategy"),
		atrPeriod: readNumber(raw, "atrPeriod", d.atrPeriod, "strategy"),
		atrMultiplier: readNumber(raw, "atrMultiplier", d.atrMultiplier, "strategy"),
		profitMultiplier: readNumber(
			raw,
			"profitMultiplier",
			d.profitMultiplier,
			"strategy"
		),
	};
	validateCrossoverParams(config);
	return config;
};

export const parseRiskConfig = (raw: unknown): RiskConfig => {
	if (!isRecord(raw)) {
		throw new ConfigurationError("risk config must be an object");
	}
	const d = DEFAULT_RISK_CONFIG;
	const groups = raw.correlationGroups ?? [];
	if (!Array.isArray(groups)) {
		throw new ConfigurationError(
			"risk.correlationGroups must be a list of symbol lists",
			"risk.correlationGroups"
		);
	}
	const risk: RiskConfig = {
		riskPerTrade: readNumber(raw, "riskPerTrade", d.riskPerTrade, "risk"),
		maxDailyLoss: readNumber(raw, "maxDailyLoss", d.maxDailyLoss, "risk"),
		maxPositions: readNumber(raw, "maxPositions", d.maxPositions, "risk"),
		maxCorrelated: readNumber(raw, "maxCorrelated", d.maxCorrelated, "risk"),
		pipValueBySymbolType: readNumberMap(
			raw.pipValueBySymbolType,
			"risk.pipValueBySymbolType"
		),
		symbolTypeBySymbol: readStringMap(
			raw.symbolTypeBySymbol,
			"risk.symbolTypeBySymbol"
		),
		correlationGroups: groups.map((group, index) =>
			readStringArray(group, `risk.correlationGroups[${index}]`)
		),
		minLot: readNumber(raw, "minLot", d.minLot, "risk"),
		maxLot: readNumber(raw, "maxLot", d.maxLot, "risk"),
	};
	validateRiskConfig(risk);
	return risk;
};

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readNumericEnvVar = (key: string, fallback: number): number => {
	const value = readOptionalEnvVar(key);
	if (value === undefined) {
		return fallback;
	}
	const parsed = Number(value);
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new ConfigurationError(
			`Environment variable ${key} must be a positive number, got "${value}"`,
			key
		);
	}
	return parsed;
};

const normalizeExecutionMode = (value: string | undefined): ExecutionMode => {
	return value?.toLowerCase() === "live" ? "live" : "paper";
};

let loadedEnvPath: string | undefined;

export const loadEnvConfig = (
	envPath = path.join(findWorkspaceRoot(), ".env")
): EnvConfig => {
	if (loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		loadedEnvPath = envPath;
	}

	return {
		executionMode: normalizeExecutionMode(readOptionalEnvVar("EXECUTION_MODE")),
		exchangeId: readOptionalEnvVar("EXCHANGE_ID") ?? "kraken",
		strategyId: readOptionalEnvVar("TRADER_STRATEGY"),
		pollIntervalMs: readNumericEnvVar("POLL_INTERVAL_MS", 300_000),
		startingBalance: readNumericEnvVar("PAPER_STARTING_BALANCE", 10_000),
		accountCurrency: readOptionalEnvVar("ACCOUNT_CURRENCY") ?? "USD",
	};
};

export const resolveStrategyConfigPath = (
	configDir: string,
	strategyProfile: string
): string => {
	const profileName = strategyProfile.endsWith(".json")
		? strategyProfile
		: `${strategyProfile}.json`;
	return path.join(configDir, "strategies", profileName);
};

export const loadStrategyConfig = (
	configDir = getDefaultConfigDir(),
	strategyProfile: string = DEFAULT_STRATEGY_ID
): StrategyConfig => {
	const strategyPath = resolveStrategyConfigPath(configDir, strategyProfile);
	return withConfigMetadata(parseStrategyConfig(readJsonFile(strategyPath)), {
		source: "file",
		path: strategyPath,
		profile: strategyProfile,
	});
};

export const loadRiskConfig = (
	configDir = getDefaultConfigDir(),
	riskProfile = "default"
): RiskConfig => {
	const riskPath = path.join(configDir, "risk", `${riskProfile}.json`);
	return withConfigMetadata(parseRiskConfig(readJsonFile(riskPath)), {
		source: "file",
		path: riskPath,
		profile: riskProfile,
	});
};

export const loadFxdeskConfig = (
	options: ConfigLoadOptions = {}
): FxdeskConfig => {
	const configDir = options.configDir ?? getDefaultConfigDir();
	const env = loadEnvConfig(options.envPath);
	const strategyProfile =
		options.strategyProfile ?? env.strategyId ?? DEFAULT_STRATEGY_ID;
	return {
		env,
		strategy: loadStrategyConfig(configDir, strategyProfile),
		risk: loadRiskConfig(configDir, options.riskProfile),
	};
};
