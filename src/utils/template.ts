/**
 * Resolves a template string by replacing {{key}} with values from a data object.
 * Missing keys resolve to an empty string.
 */
export function resolveTemplate(template: string, data: Record<string, string | number | undefined>): string {
	return template.replace(/\{\{(.*?)\}\}/g, (_, key: string) => {
		const value = data[key.trim()]
		return value === undefined ? '' : String(value)
	})
}
