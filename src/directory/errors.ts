export const LDAP_ERROR_CODES = {
	INVALID_CONFIG: "invalid directory client configuration",
	MISSING_BIND_CREDENTIALS: "bind DN or bind password was not set on the client config",
	INVALID_CA_CERTIFICATES: "could not append CA certificates from PEM",
	CONNECTION_FAILED: "could not connect to the directory server",
	CONNECTION_CLOSED: "the directory connection was closed by the peer",
	NOT_CONNECTED: "the directory client is not connected",
	INVALID_CREDENTIALS: "invalid credentials",
	EMPTY_PASSWORD: "refusing to bind with an empty password",
	BIND_FAILED: "directory bind failed",
	SEARCH_FAILED: "directory search failed",
	USER_NOT_FOUND: "user does not exist",
	TOO_MANY_ENTRIES: "ambiguous: too many entries returned",
} as const;

export type LdapErrorCode = keyof typeof LDAP_ERROR_CODES;

export type LdapErrorKind = "config" | "connection" | "protocol" | "identity";

type LdapErrorOptions = {
	cause?: unknown;
	/**
	 * Extra information for the caller, e.g. the zod issues of an invalid config
	 */
	details?: unknown;
};

/**
 * Base class of every error the directory client returns or throws.
 *
 * `code` is stable and meant for programmatic checks, the message is the matching
 * entry of {@link LDAP_ERROR_CODES}.
 */
export abstract class LdapClientError extends Error {
	abstract readonly kind: LdapErrorKind;
	readonly code: LdapErrorCode;
	readonly details?: unknown;

	constructor(code: LdapErrorCode, options: LdapErrorOptions = {}) {
		super(LDAP_ERROR_CODES[code], { cause: options.cause });
		this.name = new.target.name;
		this.code = code;
		this.details = options.details;
	}
}

/** Missing or invalid configuration, never retried. */
export class ConfigError extends LdapClientError {
	readonly kind = "config";
}

/** Dial, TLS handshake, CA parsing or closed-connection failures. */
export class ConnectionError extends LdapClientError {
	readonly kind = "connection";
}

/** Rejected binds and failed searches. */
export class ProtocolError extends LdapClientError {
	readonly kind = "protocol";
}

/** The username matched zero or several directory entries. */
export class IdentityError extends LdapClientError {
	readonly kind = "identity";
}
