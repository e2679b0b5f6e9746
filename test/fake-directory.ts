import {
	DirectoryOperationError,
	escapeFilterValue,
	type DialOptions,
	type DirectoryConnection,
	type DirectoryDialer,
	type DirectoryEntry,
	type SearchRequest,
} from "../src/directory/index.js";

export type FakeEntry = {
	dn: string;
	password: string;
	attributes: Record<string, string[]>;
};

type Script = Array<DirectoryOperationError | undefined>;

export const closedByPeer = () =>
	new DirectoryOperationError("connection-closed", "Connection closed before message response was received");

/**
 * In-memory directory: answers binds against its entries and `(attr=value)` searches.
 *
 * Failures are scripted per operation, `failNextBinds(undefined, error)` lets the first
 * bind through and fails the second one.
 */
export class FakeDirectory {
	readonly dials: DialOptions[] = [];
	readonly connections: FakeConnection[] = [];
	readonly binds: Array<{ dn: string; connection: number }> = [];
	readonly searches: SearchRequest[] = [];

	dialFailure: Error | undefined;
	private bindScript: Script = [];
	private searchScript: Script = [];

	constructor(
		readonly service: { dn: string; password: string },
		readonly entries: FakeEntry[],
	) {}

	readonly dialer: DirectoryDialer = async (options) => {
		this.dials.push(options);
		if (this.dialFailure) {
			throw this.dialFailure;
		}
		const connection = new FakeConnection(this, this.connections.length);
		this.connections.push(connection);
		return connection;
	};

	get current(): FakeConnection | undefined {
		return this.connections[this.connections.length - 1];
	}

	failNextBinds(...script: Script) {
		this.bindScript.push(...script);
	}

	failNextSearches(...script: Script) {
		this.searchScript.push(...script);
	}

	nextBindFailure() {
		return this.bindScript.shift();
	}

	nextSearchFailure() {
		return this.searchScript.shift();
	}
}

export class FakeConnection implements DirectoryConnection {
	boundAs: string | undefined;
	closed = false;

	constructor(
		private readonly directory: FakeDirectory,
		readonly index: number,
	) {}

	async bind(dn: string, password: string): Promise<void> {
		this.directory.binds.push({ dn, connection: this.index });
		const failure = this.directory.nextBindFailure();
		if (failure) {
			throw failure;
		}
		if (this.closed) {
			throw closedByPeer();
		}

		const { service, entries } = this.directory;
		const valid = (dn === service.dn && password === service.password)
			|| entries.some((entry) => entry.dn === dn && entry.password === password);
		if (!valid) {
			this.boundAs = undefined;
			throw new DirectoryOperationError("invalid-credentials", "Invalid Credentials");
		}
		this.boundAs = dn;
	}

	async search(request: SearchRequest): Promise<DirectoryEntry[]> {
		this.directory.searches.push(request);
		const failure = this.directory.nextSearchFailure();
		if (failure) {
			throw failure;
		}
		if (this.boundAs !== this.directory.service.dn) {
			throw new DirectoryOperationError("operation-failed", "Insufficient Access Rights");
		}

		const match = /^\(([^=()]+)=(.*)\)$/.exec(request.filter);
		if (!match) {
			throw new DirectoryOperationError("operation-failed", `Unsupported filter ${request.filter}`);
		}
		const [, attribute, value] = match;

		return this.directory.entries
			.filter((entry) => (entry.attributes[attribute] ?? []).some((candidate) => escapeFilterValue(candidate) === value))
			.map((entry) => ({
				dn: entry.dn,
				attributes: Object.fromEntries(
					Object.entries(entry.attributes).filter(([name]) => request.attributes.includes(name)),
				),
			}));
	}

	async close(): Promise<void> {
		this.closed = true;
		this.boundAs = undefined;
	}
}

export const SERVICE = { dn: "cn=svc,dc=example,dc=com", password: "svcpw" };

export const ALICE: FakeEntry = {
	dn: "uid=alice,ou=people,dc=example,dc=com",
	password: "hunter2",
	attributes: {
		uid: ["alice"],
		mail: ["alice@example.com"],
		displayName: ["Alice Liddell"],
	},
};

export function exampleConfig(attributes: string[] = ["mail"]) {
	return {
		host: "ldap.example.com",
		base: "dc=example,dc=com",
		userFilter: "(uid=%s)",
		attributes,
		bindDN: SERVICE.dn,
		bindPassword: SERVICE.password,
	};
}

export const silentLogger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};
