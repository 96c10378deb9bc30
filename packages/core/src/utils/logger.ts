export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

type Nullable<T> = T | null | undefined;

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

export const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (prettyEnabled) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			console.log(JSON.stringify(sanitize(base)));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

const sanitize = (payload: BaseLogPayload): unknown => {
	const seen = new WeakSet<object>();
	return sanitizeValue(payload, seen);
};

export const sanitizeValue = (
	value: unknown,
	seen: WeakSet<object> = new WeakSet<object>()
): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	switch (event) {
		case "strategy_decision": {
			printStrategyDecision(rest);
			break;
		}
		case "order_intent": {
			printOrderIntent(rest);
			break;
		}
		case "paper_account_snapshot": {
			printPaperAccountSnapshot(rest);
			break;
		}
		default:
			break;
	}
}

const fmtNumber = (value: Nullable<number>): string =>
	typeof value === "number" ? value.toFixed(5) : "n/a";

const printStrategyDecision = (rest: Record<string, unknown>): void => {
	const { symbol, kind, reason, timestamp, indicators } =
		rest as StrategyDecisionPrettyPayload;
	console.table([{ symbol, kind, reason, timestamp }]);
	if (!indicators) {
		return;
	}
	const rows = Object.entries(indicators).map(([name, value]) => ({
		indicator: name,
		value: typeof value === "number" ? fmtNumber(value) : String(value),
	}));
	if (rows.length > 0) {
		console.table(rows);
	}
};

const printOrderIntent = (rest: Record<string, unknown>): void => {
	const { symbol, side, size, price, stopLoss, takeProfit } =
		rest as OrderIntentPrettyPayload;
	console.table([
		{
			symbol,
			side,
			size,
			price: fmtNumber(price),
			stopLoss: fmtNumber(stopLoss),
			takeProfit: fmtNumber(takeProfit),
		},
	]);
};

const printPaperAccountSnapshot = (rest: Record<string, unknown>): void => {
	const { snapshot } = rest as PaperAccountSnapshotPrettyPayload;
	if (!snapshot) {
		return;
	}
	const { startingBalance, balance, totalRealizedPnl, trades } = snapshot;
	console.table([
		{
			startingBalance,
			balance,
			totalRealizedPnl,
			tradesTotal: trades?.total,
			tradesWins: trades?.wins,
			tradesLosses: trades?.losses,
		},
	]);
};

interface StrategyDecisionPrettyPayload {
	symbol?: string;
	kind?: string;
	reason?: string;
	timestamp?: number;
	indicators?: Record<string, unknown>;
}

interface OrderIntentPrettyPayload {
	symbol?: string;
	side?: string;
	size?: number;
	price?: Nullable<number>;
	stopLoss?: Nullable<number>;
	takeProfit?: Nullable<number>;
}

interface PaperAccountSnapshotPrettyPayload {
	snapshot?: {
		startingBalance?: number;
		balance?: number;
		totalRealizedPnl?: number;
		trades?: {
			total?: number;
			wins?: number;
			losses?: number;
		};
	};
}
