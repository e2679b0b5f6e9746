export const LDAP_PLUGIN_ERROR_CODES = {
	INVALID_USERNAME_OR_PASSWORD: "invalid username or password",
	DIRECTORY_UNAVAILABLE: "directory server unavailable",
	EMAIL_REQUIRED: "the directory entry has no email address",
	EMAIL_NOT_VERIFIED: "email not verified",
	UNEXPECTED_ERROR: "unexpected error",
};
