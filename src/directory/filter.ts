/**
 * Escapes a value for use inside an LDAP search filter (RFC 4515, section 3)
 */
export function escapeFilterValue(value: string): string {
	return value
		.replace(/\\/g, "\\5c")
		.replace(/\*/g, "\\2a")
		.replace(/\(/g, "\\28")
		.replace(/\)/g, "\\29")
		.replace(/\x00/g, "\\00");
}

/**
 * Substitutes the `%s` slot of a filter template, e.g. `(uid=%s)`, with the escaped username
 */
export function formatUserFilter(template: string, username: string): string {
	// A function replacement keeps `$&` and friends in usernames literal
	return template.replace("%s", () => escapeFilterValue(username));
}
