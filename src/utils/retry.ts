export function waitMs(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise((resolve) => setTimeout(resolve, ms));
}

function jitter(base: number, max: number): number {
	const jitterVal = Math.random() * base;
	return Math.min(max, base + jitterVal);
}

export function backoffMs(baseMs: number, retry: number, maxMs: number): number {
	return jitter(baseMs * Math.pow(2, retry), maxMs);
}

export function isTransientStatus(status: number): boolean {
	return status === 429 || status >= 500;
}

export async function safeSnippet(res: Response): Promise<string> {
	try {
		return (await res.text()).slice(0, 180);
	} catch {
		return 'unavailable';
	}
}

export function clamp(n: number, min: number, max: number): number {
	if (Number.isNaN(n)) return min;
	return Math.max(min, Math.min(max, n));
}
