import { X509Certificate } from "node:crypto";
import type { ConnectionOptions } from "node:tls";
import { Client, InvalidCredentialsError, ResultCodeError } from "ldapts";
import { resolvePort, type LdapClientConfig } from "./config.js";
import { ConnectionError } from "./errors.js";

export type DirectoryEntry = {
	dn: string;
	/**
	 * Every value is returned as a string, binary values are decoded as utf-8
	 */
	attributes: Record<string, string[]>;
};

export type SearchRequest = {
	base: string;
	scope: "base" | "one" | "sub";
	derefAliases: "never" | "always" | "search" | "find";
	sizeLimit: number;
	timeLimit: number;
	typesOnly: boolean;
	filter: string;
	attributes: string[];
};

/**
 * The directory protocol operations the client relies on, one instance per transport connection
 */
export interface DirectoryConnection {
	bind(dn: string, password: string): Promise<void>;
	search(request: SearchRequest): Promise<DirectoryEntry[]>;
	close(): Promise<void>;
}

export type DialOptions = {
	url: string;
	tlsOptions?: ConnectionOptions;
	connectTimeout?: number;
	timeout?: number;
};

export type DirectoryDialer = (options: DialOptions) => Promise<DirectoryConnection>;

export type DirectoryFailureKind =
	| "connection-closed"
	| "unavailable"
	| "invalid-credentials"
	| "operation-failed";

/**
 * Failure of a directory operation, classified so callers never have to match on messages
 */
export class DirectoryOperationError extends Error {
	readonly kind: DirectoryFailureKind;

	constructor(kind: DirectoryFailureKind, message: string, options: { cause?: unknown } = {}) {
		super(message, { cause: options.cause });
		this.name = "DirectoryOperationError";
		this.kind = kind;
	}
}

const CLOSED_CODES = new Set(["ECONNRESET", "EPIPE"]);
const UNAVAILABLE_CODES = new Set([
	"ECONNREFUSED",
	"ENOTFOUND",
	"EAI_AGAIN",
	"ETIMEDOUT",
	"EHOSTUNREACH",
	"ENETUNREACH",
]);

function isTlsFailure(code: string): boolean {
	return code.startsWith("ERR_TLS") || code.startsWith("ERR_SSL") || code.includes("CERT") || code.includes("SIGNATURE");
}

export function classifyDirectoryError(error: unknown): DirectoryOperationError {
	if (error instanceof DirectoryOperationError) {
		return error;
	}
	if (error instanceof InvalidCredentialsError) {
		return new DirectoryOperationError("invalid-credentials", error.message, { cause: error });
	}
	if (error instanceof ResultCodeError) {
		return new DirectoryOperationError("operation-failed", error.message, { cause: error });
	}
	if (error instanceof Error) {
		const code = "code" in error && typeof error.code === "string" ? error.code : "";
		if (CLOSED_CODES.has(code) || /connection closed/i.test(error.message)) {
			return new DirectoryOperationError("connection-closed", error.message, { cause: error });
		}
		if (UNAVAILABLE_CODES.has(code) || isTlsFailure(code) || /timeout/i.test(error.message)) {
			return new DirectoryOperationError("unavailable", error.message, { cause: error });
		}
		return new DirectoryOperationError("operation-failed", error.message, { cause: error });
	}
	return new DirectoryOperationError("operation-failed", String(error), { cause: error });
}

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

function isCertificate(pem: string): boolean {
	try {
		new X509Certificate(pem);
		return true;
	} catch {
		return false;
	}
}

/**
 * Splits a PEM bundle into its certificates, keeping the ones that parse.
 *
 * Fails when the bundle holds no usable certificate.
 */
export function parseCaCertificates(pem: string | Buffer): string[] {
	const blocks = pem.toString().match(PEM_CERTIFICATE) ?? [];
	const certificates = blocks.filter(isCertificate);
	if (certificates.length === 0) {
		throw new ConnectionError("INVALID_CA_CERTIFICATES");
	}
	return certificates;
}

export function buildDialOptions(config: LdapClientConfig): DialOptions {
	const port = resolvePort(config);
	const options: DialOptions = {
		url: `${config.useSSL ? "ldaps" : "ldap"}://${config.host}:${port}`,
		connectTimeout: config.connectTimeout,
		timeout: config.timeout,
	};
	if (!config.useSSL) {
		return options;
	}

	const tlsOptions: ConnectionOptions = {
		rejectUnauthorized: !config.insecureSkipVerify,
		servername: config.host,
	};
	if (config.caCertificates && config.caCertificates.length > 0) {
		tlsOptions.ca = parseCaCertificates(config.caCertificates);
	}
	if (config.clientCertificates && config.clientCertificates.length > 0) {
		tlsOptions.cert = config.clientCertificates.map((certificate) => certificate.cert);
		tlsOptions.key = config.clientCertificates.map((certificate) =>
			certificate.passphrase
				? { pem: certificate.key, passphrase: certificate.passphrase }
				: certificate.key,
		);
	}
	return { ...options, tlsOptions };
}

type LdaptsEntry = Awaited<ReturnType<Client["search"]>>["searchEntries"][number];

function toDirectoryEntry(entry: LdaptsEntry): DirectoryEntry {
	const attributes: Record<string, string[]> = {};
	for (const [name, value] of Object.entries(entry)) {
		if (name === "dn") {
			continue;
		}
		const values: Array<string | Buffer> = Array.isArray(value) ? value : [value];
		attributes[name] = values.map((item) => (typeof item === "string" ? item : item.toString("utf8")));
	}
	return { dn: entry.dn, attributes };
}

class LdaptsConnection implements DirectoryConnection {
	constructor(private readonly client: Client) {}

	async bind(dn: string, password: string): Promise<void> {
		try {
			await this.client.bind(dn, password);
		} catch (error) {
			throw classifyDirectoryError(error);
		}
	}

	async search(request: SearchRequest): Promise<DirectoryEntry[]> {
		try {
			const { searchEntries } = await this.client.search(request.base, {
				scope: request.scope,
				filter: request.filter,
				derefAliases: request.derefAliases,
				sizeLimit: request.sizeLimit,
				timeLimit: request.timeLimit,
				returnAttributeValues: !request.typesOnly,
				attributes: request.attributes,
			});
			return searchEntries.map(toDirectoryEntry);
		} catch (error) {
			throw classifyDirectoryError(error);
		}
	}

	async close(): Promise<void> {
		try {
			await this.client.unbind();
		} catch (error) {
			throw classifyDirectoryError(error);
		}
	}
}

/**
 * Default dialer, backed by an `ldapts` client.
 *
 * `ldapts` opens the socket on the first operation, so an unreachable server
 * surfaces from the first bind rather than from here.
 */
export const ldaptsDialer: DirectoryDialer = async (options) => {
	const client = new Client({
		url: options.url,
		tlsOptions: options.tlsOptions,
		connectTimeout: options.connectTimeout,
		timeout: options.timeout,
		strictDN: true,
	});
	return new LdaptsConnection(client);
};
