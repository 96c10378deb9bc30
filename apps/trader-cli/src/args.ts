export type ArgValue = string | boolean;

/** Accepts `--key value`, `--key=value` and bare `--flag`. */
export const parseCliArgs = (argv: readonly string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

export const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length ? value : undefined;
};

export const getFlag = (args: Record<string, ArgValue>, key: string): boolean =>
	args[key] === true || args[key] === "true";
