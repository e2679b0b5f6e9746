export {
	LdapClient,
	openLdapClient,
	MAX_DISCONNECTS,
	type AuthenticationResult,
	type DirectoryAuthenticator,
	type DirectoryLogger,
	type LdapClientOptions,
	type OpenLdapClientResult,
	type UserAttributes,
} from "./client.js";
export {
	ldapClientConfigSchema,
	loadLdapConfigFromEnv,
	parseLdapConfig,
	type ClientCertificate,
	type LdapClientConfig,
	type LdapClientInput,
} from "./config.js";
export {
	DirectoryOperationError,
	buildDialOptions,
	classifyDirectoryError,
	ldaptsDialer,
	parseCaCertificates,
	type DialOptions,
	type DirectoryConnection,
	type DirectoryDialer,
	type DirectoryEntry,
	type DirectoryFailureKind,
	type SearchRequest,
} from "./connection.js";
export {
	ConfigError,
	ConnectionError,
	IdentityError,
	LDAP_ERROR_CODES,
	LdapClientError,
	ProtocolError,
	type LdapErrorCode,
	type LdapErrorKind,
} from "./errors.js";
export { escapeFilterValue, formatUserFilter } from "./filter.js";
