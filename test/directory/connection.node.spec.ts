import { readFileSync } from "node:fs";
import { describe, expect, test } from "vitest";
import { InvalidCredentialsError } from "ldapts";
import {
	ConnectionError,
	DirectoryOperationError,
	buildDialOptions,
	classifyDirectoryError,
	ldaptsDialer,
	parseCaCertificates,
	parseLdapConfig,
} from "../../src/directory/index.js";
import { exampleConfig } from "../fake-directory.js";

const caPem = readFileSync(new URL("../fixtures/ca.pem", import.meta.url), "utf8");

function errno(message: string, code: string) {
	return Object.assign(new Error(message), { code });
}

describe("classifyDirectoryError", () => {
	test.each([
		{ error: new InvalidCredentialsError("Invalid Credentials"), kind: "invalid-credentials" },
		{ error: errno("read ECONNRESET", "ECONNRESET"), kind: "connection-closed" },
		{ error: errno("write EPIPE", "EPIPE"), kind: "connection-closed" },
		{ error: new Error("Connection closed before message response was received. Message type: BindRequest (0x60)"), kind: "connection-closed" },
		{ error: errno("connect ECONNREFUSED 127.0.0.1:389", "ECONNREFUSED"), kind: "unavailable" },
		{ error: errno("self-signed certificate", "DEPTH_ZERO_SELF_SIGNED_CERT"), kind: "unavailable" },
		{ error: new Error("Connection timeout after 5000ms"), kind: "unavailable" },
		{ error: new Error("Something else"), kind: "operation-failed" },
		{ error: "not an error", kind: "operation-failed" },
	])("$kind: $error", ({ error, kind }) => {
		const classified = classifyDirectoryError(error);

		expect(classified).toBeInstanceOf(DirectoryOperationError);
		expect(classified.kind).toBe(kind);
		expect(classified.cause).toBe(error);
	});

	test("keeps errors that are already classified", () => {
		const error = new DirectoryOperationError("connection-closed", "closed");

		expect(classifyDirectoryError(error)).toBe(error);
	});
});

describe("parseCaCertificates", () => {
	test("keeps the certificates that parse", () => {
		const broken = "-----BEGIN CERTIFICATE-----\nbm90IGEgY2VydA==\n-----END CERTIFICATE-----";

		expect(parseCaCertificates(`${broken}\n${caPem}`)).toEqual([caPem.trim()]);
	});

	test("accepts buffers", () => {
		expect(parseCaCertificates(Buffer.from(caPem))).toHaveLength(1);
	});

	test.each(["", "garbage", "-----BEGIN CERTIFICATE-----\nbm90IGEgY2VydA==\n-----END CERTIFICATE-----"])(
		"fails without a usable certificate: %j",
		(pem) => {
			expect(() => parseCaCertificates(pem)).toThrow(ConnectionError);
		},
	);
});

describe("buildDialOptions", () => {
	test("uses the configured port and timeouts", () => {
		const options = buildDialOptions(parseLdapConfig({ ...exampleConfig(), port: 10389, connectTimeout: 5000, timeout: 10000 }));

		expect(options).toEqual({ url: "ldap://ldap.example.com:10389", connectTimeout: 5000, timeout: 10000 });
	});

	test("presents client certificates over TLS", () => {
		const options = buildDialOptions(parseLdapConfig({
			...exampleConfig(),
			useSSL: true,
			clientCertificates: [
				{ cert: "client-cert", key: "client-key" },
				{ cert: "other-cert", key: "other-key", passphrase: "test-passphrase" },
			],
		}));

		expect(options.tlsOptions).toEqual({
			rejectUnauthorized: true,
			servername: "ldap.example.com",
			cert: ["client-cert", "other-cert"],
			key: ["client-key", { pem: "other-key", passphrase: "test-passphrase" }],
		});
	});
});

describe("ldaptsDialer", () => {
	test("creates a connection without opening a socket", async () => {
		const connection = await ldaptsDialer({ url: "ldap://127.0.0.1:1" });

		expect(typeof connection.bind).toBe("function");
		expect(typeof connection.search).toBe("function");
	});
});
