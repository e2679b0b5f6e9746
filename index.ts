export {
    ldap,
    ldapSignInSchema,
    type LDAPOptions,
    type LdapIdentity,
} from "./src/ldap/index.js";

export {
    LDAP_PLUGIN_ERROR_CODES
} from "./src/ldap/error-codes.js";

export * from "./src/directory/index.js";
