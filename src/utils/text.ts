export function stripTags(input: string): string {
	return input.replace(/<[^>]+>/g, '').trim();
}

export function asText(value: unknown): string | null {
	if (typeof value !== 'string') return null;
	const trimmed = value.trim();
	return trimmed ? value : null;
}

export function toSnakeKey(label: string): string {
	return label
		.toLowerCase()
		.replace(/[^a-z0-9]+/g, '_')
		.replace(/^_+|_+$/g, '');
}
