import { parseLdapConfig, type LdapClientConfig, type LdapClientInput } from "./config.js";
import {
	buildDialOptions,
	classifyDirectoryError,
	ldaptsDialer,
	type DirectoryConnection,
	type DirectoryDialer,
	type DirectoryEntry,
} from "./connection.js";
import {
	ConfigError,
	ConnectionError,
	IdentityError,
	LdapClientError,
	ProtocolError,
} from "./errors.js";
import { formatUserFilter } from "./filter.js";

/**
 * Number of consecutive closed-connection failures after which a bind gives up.
 * The first one is answered with a reconnect and a single retry.
 */
export const MAX_DISCONNECTS = 2;

export type DirectoryLogger = {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
};

export type LdapClientOptions = {
	/**
	 * Opens the transport connection, defaults to {@link ldaptsDialer}
	 */
	dialer?: DirectoryDialer;
	/**
	 * Silent by default, the better-auth plugin passes its own logger
	 */
	logger?: DirectoryLogger;
};

const noopLogger: DirectoryLogger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};

export type UserAttributes = Record<string, string>;

export type AuthenticationResult =
	| {
			authenticated: true;
			dn: string;
			attributes: UserAttributes;
			restoreError?: LdapClientError;
	  }
	| {
			authenticated: false;
			/**
			 * Present once the username resolved to a single entry
			 */
			dn?: string;
			attributes?: UserAttributes;
			error: LdapClientError;
			/**
			 * Set when re-binding as the service identity failed after the outcome was known
			 */
			restoreError?: LdapClientError;
	  };

export interface DirectoryAuthenticator {
	bind(): Promise<void>;
	authenticate(username: string, password: string): Promise<AuthenticationResult>;
	close(): Promise<void>;
}

function toClientError(error: unknown): LdapClientError {
	if (error instanceof LdapClientError) {
		return error;
	}
	const failure = classifyDirectoryError(error);
	switch (failure.kind) {
		case "connection-closed":
			return new ConnectionError("CONNECTION_CLOSED", { cause: failure });
		case "unavailable":
			return new ConnectionError("CONNECTION_FAILED", { cause: failure });
		case "invalid-credentials":
			return new ProtocolError("INVALID_CREDENTIALS", { cause: failure });
		case "operation-failed":
			return new ProtocolError("BIND_FAILED", { cause: failure });
	}
}

function firstValue(entry: DirectoryEntry, name: string): string {
	const values = entry.attributes[name]
		?? Object.entries(entry.attributes).find(([key]) => key.toLowerCase() === name.toLowerCase())?.[1];
	return values?.[0] ?? "";
}

/**
 * LDAP client that validates user passwords with a search-then-bind sequence.
 *
 * The client owns a single connection, bound as the configured service identity
 * between calls. Public operations are queued so that concurrent callers never
 * observe the connection while it is bound as a user.
 *
 * @example
 * ```ts
 * const { client, error } = await openLdapClient({
 *   host: "ldap.example.com",
 *   base: "dc=example,dc=com",
 *   userFilter: "(uid=%s)",
 *   attributes: ["mail"],
 *   bindDN: "cn=svc,dc=example,dc=com",
 *   bindPassword: "secret",
 * });
 * if (error) throw error;
 *
 * const result = await client.authenticate("alice", "password");
 * ```
 */
export class LdapClient implements DirectoryAuthenticator {
	readonly config: LdapClientConfig;

	private readonly dialer: DirectoryDialer;
	private readonly logger: DirectoryLogger;
	private connection: DirectoryConnection | undefined;
	private disconnectRetryCount = 0;
	private queue: Promise<void> = Promise.resolve();

	constructor(config: LdapClientInput | LdapClientConfig, options: LdapClientOptions = {}) {
		this.config = parseLdapConfig(config);
		this.dialer = options.dialer ?? ldaptsDialer;
		this.logger = options.logger ?? noopLogger;
	}

	get connected(): boolean {
		return this.connection !== undefined;
	}

	get disconnects(): number {
		return this.disconnectRetryCount;
	}

	/**
	 * Opens a new connection, closing the current one first
	 */
	connect(): Promise<void> {
		return this.exclusive(() => this.openConnection());
	}

	/**
	 * Connects only when no connection is held
	 */
	ensureConnected(): Promise<void> {
		return this.exclusive(async () => {
			if (!this.connection) {
				await this.openConnection();
			}
		});
	}

	close(): Promise<void> {
		return this.exclusive(() => this.closeConnection());
	}

	/**
	 * Binds as the configured service identity.
	 *
	 * A bind failing because the peer closed the connection is retried once on a fresh connection.
	 */
	bind(): Promise<void> {
		return this.exclusive(() => this.bindAsService());
	}

	/**
	 * Checks a username and password against the directory.
	 *
	 * Directory outcomes are reported in the result rather than thrown. Whatever the outcome,
	 * the connection is bound as the service identity again before the promise settles.
	 */
	authenticate(username: string, password: string): Promise<AuthenticationResult> {
		return this.exclusive(() => this.runAuthentication(username, password));
	}

	private exclusive<T>(task: () => Promise<T>): Promise<T> {
		const run = this.queue.then(task);
		// The caller gets the rejection through `run`, the queue only needs to move on
		this.queue = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	private async openConnection(): Promise<void> {
		await this.closeConnection().catch((error: unknown) => {
			this.logger.warn("Failed to close the previous directory connection", { error });
		});

		const options = buildDialOptions(this.config);
		try {
			this.connection = await this.dialer(options);
		} catch (error) {
			throw new ConnectionError("CONNECTION_FAILED", { cause: error });
		}
		this.logger.debug("Directory connection opened", { url: options.url });
	}

	private async closeConnection(): Promise<void> {
		const connection = this.connection;
		if (!connection) {
			return;
		}
		this.connection = undefined;
		await connection.close();
	}

	private requireConnection(): DirectoryConnection {
		if (!this.connection) {
			throw new ConnectionError("NOT_CONNECTED");
		}
		return this.connection;
	}

	private async bindAsService(): Promise<void> {
		const { bindDN, bindPassword } = this.config;
		if (!bindDN || !bindPassword) {
			throw new ConfigError("MISSING_BIND_CREDENTIALS");
		}

		this.disconnectRetryCount = 0;
		for (;;) {
			try {
				await this.requireConnection().bind(bindDN, bindPassword);
				this.disconnectRetryCount = 0;
				return;
			} catch (error) {
				if (error instanceof LdapClientError) {
					throw error;
				}
				const failure = classifyDirectoryError(error);
				if (failure.kind !== "connection-closed") {
					throw toClientError(failure);
				}
				this.disconnectRetryCount++;
				if (this.disconnectRetryCount >= MAX_DISCONNECTS) {
					throw toClientError(failure);
				}
				this.logger.warn("Directory connection was closed, reconnecting", { attempt: this.disconnectRetryCount });
				await this.openConnection();
			}
		}
	}

	private async runAuthentication(username: string, password: string): Promise<AuthenticationResult> {
		try {
			await this.bindAsService();
		} catch (error) {
			return { authenticated: false, error: toClientError(error) };
		}

		let outcome: AuthenticationResult;
		try {
			outcome = await this.verifyUser(username, password);
		} catch (error) {
			await this.restoreServiceBind();
			throw error;
		}

		const restoreError = await this.restoreServiceBind();
		this.logger.debug("Directory authentication finished", { username, authenticated: outcome.authenticated });
		return restoreError ? { ...outcome, restoreError } : outcome;
	}

	private async restoreServiceBind(): Promise<LdapClientError | undefined> {
		try {
			await this.bindAsService();
			return undefined;
		} catch (error) {
			const restoreError = toClientError(error);
			this.logger.warn("Failed to restore the service bind", { error: restoreError });
			return restoreError;
		}
	}

	private async verifyUser(username: string, password: string): Promise<AuthenticationResult> {
		let entries: DirectoryEntry[];
		try {
			entries = await this.requireConnection().search({
				base: this.config.base,
				scope: "sub",
				derefAliases: "never",
				sizeLimit: 0,
				timeLimit: 0,
				typesOnly: false,
				filter: formatUserFilter(this.config.userFilter, username),
				attributes: [...this.config.attributes, "dn"],
			});
		} catch (error) {
			const cause = error instanceof LdapClientError ? error : classifyDirectoryError(error);
			return { authenticated: false, error: new ProtocolError("SEARCH_FAILED", { cause }) };
		}

		if (entries.length < 1) {
			return { authenticated: false, error: new IdentityError("USER_NOT_FOUND") };
		}
		if (entries.length > 1) {
			return { authenticated: false, error: new IdentityError("TOO_MANY_ENTRIES") };
		}

		const [entry] = entries;
		const attributes: UserAttributes = {};
		for (const name of this.config.attributes) {
			attributes[name] = firstValue(entry, name);
		}

		// A simple bind with an empty password is an anonymous bind, which servers accept
		if (password.length === 0) {
			return { authenticated: false, dn: entry.dn, attributes, error: new ProtocolError("EMPTY_PASSWORD") };
		}

		// One-shot probe: a closed connection here is reported, not retried
		try {
			await this.requireConnection().bind(entry.dn, password);
		} catch (error) {
			return { authenticated: false, dn: entry.dn, attributes, error: toClientError(error) };
		}
		return { authenticated: true, dn: entry.dn, attributes };
	}
}

export type OpenLdapClientResult =
	| { client: LdapClient; error?: undefined }
	| { client: LdapClient; error: LdapClientError };

/**
 * Creates a client, connects and binds as the service identity.
 *
 * On failure the returned client holds no connection and `error` says why; it can be
 * connected again later with {@link LdapClient.connect}. An invalid configuration
 * throws a {@link ConfigError} since no client can be built from it.
 */
export async function openLdapClient(
	config: LdapClientInput | LdapClientConfig,
	options: LdapClientOptions = {},
): Promise<OpenLdapClientResult> {
	const client = new LdapClient(config, options);
	try {
		await client.connect();
		await client.bind();
		return { client };
	} catch (error) {
		// close() detaches the connection before closing it, so the client is disconnected either way
		await client.close().catch((closeError: unknown) => {
			(options.logger ?? noopLogger).warn("Failed to close the directory connection", { error: closeError });
		});
		return { client, error: toClientError(error) };
	}
}
