// Narrowing helpers for provider JSON payloads, which arrive as `unknown`

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function firstItem(value: unknown): unknown {
	return Array.isArray(value) && value.length > 0 ? value[0] : undefined;
}

/** Reads a coordinate that may be sent as a number or a numeric string. */
export function readNumber(value: unknown): number | null {
	if (typeof value === 'number') {
		return Number.isFinite(value) ? value : null;
	}
	if (typeof value === 'string' && value.trim() !== '') {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
}

export function readProperty(value: unknown, ...path: string[]): unknown {
	let current: unknown = value;
	for (const key of path) {
		if (!isRecord(current)) {
			return undefined;
		}
		current = current[key];
	}
	return current;
}

export function readText(value: unknown): string {
	return typeof value === 'string' ? value : '';
}
