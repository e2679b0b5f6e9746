import * as z from "zod";
import { ConfigError } from "./errors.js";

const pemSchema = z.union([z.string(), z.instanceof(Buffer)]);

const clientCertificateSchema = z.object({
	cert: pemSchema,
	key: pemSchema,
	passphrase: z.string().optional(),
});

export const ldapClientConfigSchema = z.object({
	host: z.string().min(1),
	/**
	 * Defaults to 636 when `useSSL` is set, 389 otherwise
	 */
	port: z.number().int().min(1).max(65535).optional(),
	useSSL: z.boolean().default(false),
	insecureSkipVerify: z.boolean().default(false),
	caCertificates: pemSchema.optional(),
	clientCertificates: z.array(clientCertificateSchema).optional(),
	// Emptiness is only an error once a service bind is attempted
	bindDN: z.string().default(""),
	bindPassword: z.string().default(""),
	base: z.string(),
	userFilter: z.string().refine((filter) => filter.split("%s").length === 2, {
		message: "userFilter must contain exactly one %s placeholder",
	}),
	groupFilter: z.string().optional(),
	attributes: z.array(z.string().min(1)).default([]),
	connectTimeout: z.number().int().positive().optional(),
	timeout: z.number().int().positive().optional(),
});

export type LdapClientInput = z.input<typeof ldapClientConfigSchema>;
export type ClientCertificate = z.output<typeof clientCertificateSchema>;
/**
 * Parsed configuration, frozen all the way down to the certificate entries
 */
export type LdapClientConfig = Readonly<Omit<z.output<typeof ldapClientConfigSchema>, "attributes" | "clientCertificates">> & {
	readonly attributes: readonly string[];
	readonly clientCertificates?: readonly Readonly<ClientCertificate>[];
};

export function parseLdapConfig(input: LdapClientInput | LdapClientConfig): LdapClientConfig {
	const parsed = ldapClientConfigSchema.safeParse(input);
	if (!parsed.success) {
		throw new ConfigError("INVALID_CONFIG", {
			details: parsed.error.issues,
		});
	}
	const { attributes, clientCertificates, ...rest } = parsed.data;
	return Object.freeze({
		...rest,
		attributes: Object.freeze([...attributes]),
		clientCertificates: clientCertificates && Object.freeze(
			clientCertificates.map((certificate) => Object.freeze({ ...certificate })),
		),
	});
}

export function resolvePort(config: Pick<LdapClientConfig, "port" | "useSSL">): number {
	return config.port ?? (config.useSSL ? 636 : 389);
}

const booleanFlag = z
	.enum(["true", "false", "1", "0", "yes", "no"])
	.transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
	LDAP_HOST: z.string(),
	LDAP_PORT: z.coerce.number().optional(),
	LDAP_USE_SSL: booleanFlag.optional(),
	LDAP_INSECURE_SKIP_VERIFY: booleanFlag.optional(),
	LDAP_CA_CERT: z.string().optional(),
	LDAP_BIND_DN: z.string().optional(),
	LDAP_BIND_PASSWORD: z.string().optional(),
	LDAP_BASE_DN: z.string(),
	LDAP_USER_FILTER: z.string().default("(uid=%s)"),
	LDAP_GROUP_FILTER: z.string().optional(),
	LDAP_ATTRIBUTES: z.string().optional(),
});

/**
 * Builds the client configuration from environment variables, e.g. `process.env`
 *
 * `LDAP_ATTRIBUTES` is a comma separated list: `mail,displayName,uid`
 */
export function loadLdapConfigFromEnv(env: Record<string, string | undefined>): LdapClientConfig {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigError("INVALID_CONFIG", {
			details: parsed.error.issues,
		});
	}
	const vars = parsed.data;

	return parseLdapConfig({
		host: vars.LDAP_HOST,
		port: vars.LDAP_PORT,
		useSSL: vars.LDAP_USE_SSL,
		insecureSkipVerify: vars.LDAP_INSECURE_SKIP_VERIFY,
		caCertificates: vars.LDAP_CA_CERT,
		bindDN: vars.LDAP_BIND_DN,
		bindPassword: vars.LDAP_BIND_PASSWORD,
		base: vars.LDAP_BASE_DN,
		userFilter: vars.LDAP_USER_FILTER,
		groupFilter: vars.LDAP_GROUP_FILTER,
		attributes: vars.LDAP_ATTRIBUTES
			?.split(",")
			.map((attribute) => attribute.trim())
			.filter((attribute) => attribute.length > 0),
	});
}
