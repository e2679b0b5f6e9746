import * as z from "zod";
import type { Account, BetterAuthPlugin, User } from "better-auth";
import { APIError, createAuthEndpoint, sendVerificationEmailFn } from "better-auth/api";
import { setSessionCookie } from "better-auth/cookies";
import { parseUserOutput } from "better-auth/db";
import { LdapClient, type AuthenticationResult, type DirectoryLogger, type UserAttributes } from "../directory/client.js";
import { parseLdapConfig, type LdapClientConfig, type LdapClientInput } from "../directory/config.js";
import type { DirectoryDialer } from "../directory/connection.js";
import { LDAP_PLUGIN_ERROR_CODES } from "./error-codes.js";

type MaybePromise<T> = T | Promise<T>;

export type LdapIdentity = {
	/** The credential submitted on sign in */
	username: string;
	dn: string;
	attributes: UserAttributes;
};

export type LDAPOptions<P extends string = "/sign-in/ldap"> = {
	/**
	 * The directory client configuration, or a client shared with the rest of the application.
	 *
	 * Attributes used to build the user (see `emailAttribute` and `nameAttribute`) must be listed in `attributes`.
	 */
	client: LdapClientInput | LdapClientConfig | LdapClient;

	/**
	 * Replaces the default `ldapts` transport, only used when `client` is a configuration
	 */
	dialer?: DirectoryDialer;

	/**
	 * Directory attribute holding the user's email
	 * @default "mail"
	 */
	emailAttribute?: string;

	/**
	 * Directory attribute holding the user's display name, falls back to the submitted credential
	 * @default "displayName"
	 */
	nameAttribute?: string;

	/**
	 * Maps the authenticated directory identity to the user data stored in better-auth.
	 *
	 * Returning null rejects the sign in. The result must contain an `email` unless the
	 * default mapping is used.
	 *
	 * @example
	 * ```ts
	 * onLdapAuthenticated({ username, attributes }) {
	 *   return { email: attributes.mail, name: attributes.cn || username };
	 * }
	 * ```
	 */
	onLdapAuthenticated?: (identity: LdapIdentity) => MaybePromise<Partial<User> | null | undefined>;

	/**
	 * Whether to sign up the user if they successfully authenticate on LDAP but do not exist locally
	 * @default false
	 */
	autoSignUp?: boolean;

	/**
	 * Whether an existing user without an account of this provider gets one linked on sign in
	 * (no effect if `autoSignUp` is false)
	 * @default false
	 */
	linkAccountIfExisting?: boolean;

	/**
	 * Provider id of the accounts created by this plugin, the account id is the entry DN
	 * @default "ldap"
	 */
	providerId?: string;

	/**
	 * The path for the endpoint
	 * @default "/sign-in/ldap"
	 */
	path?: P;
};

export const ldapSignInSchema = z.object({
	credential: z.string().min(1).meta({
		description: "The directory username of the user",
	}),
	password: z.string().min(1).meta({
		description: "The password of the user",
	}),
	rememberMe: z.boolean().optional().meta({
		description: "Remember the user session",
	}),
});

/**
 * LDAP sign in for better-auth.
 *
 * 1. Validate the body against {@link ldapSignInSchema}
 * 2. Search the directory for the credential and bind as the entry found (see {@link LdapClient.authenticate})
 * 3. Map the identity to user data, `onLdapAuthenticated` or the `emailAttribute`/`nameAttribute` defaults
 * 4. Find the user by email. Unknown users are signed up when `autoSignUp` is true, with an account of
 *    `providerId` linked to them. Known users need an account of `providerId`, or get one when
 *    `linkAccountIfExisting` is true, and are updated with the mapped data
 * 5. Create the session, set the session cookie and return the token and user
 */
export const ldap = <P extends string = "/sign-in/ldap">(options: LDAPOptions<P>) => {
	const providerId = options.providerId || "ldap";
	const emailAttribute = options.emailAttribute || "mail";
	const nameAttribute = options.nameAttribute || "displayName";

	const source = options.client;
	// Fail at startup on a bad configuration, the connection itself is opened on the first sign in
	const config = source instanceof LdapClient ? source.config : parseLdapConfig(source);
	let directory: LdapClient | undefined = source instanceof LdapClient ? source : undefined;

	const getDirectory = (logger: DirectoryLogger): LdapClient => {
		directory ??= new LdapClient(config, { dialer: options.dialer, logger });
		return directory;
	};

	const mapIdentity = async (identity: LdapIdentity): Promise<Partial<User> | null | undefined> => {
		if (options.onLdapAuthenticated) {
			return options.onLdapAuthenticated(identity);
		}
		return {
			email: identity.attributes[emailAttribute],
			name: identity.attributes[nameAttribute] || identity.username,
		};
	};

	return {
		id: "ldap",
		endpoints: {
			signInLdap: createAuthEndpoint(
				// The client plugin infers the endpoint path from this type
				(options.path || "/sign-in/ldap") as P,
				{
					method: "POST",
					body: ldapSignInSchema,
					metadata: {
						openapi: {
							summary: "Sign in with LDAP",
							description: "Sign in with LDAP using the user's directory username and password",
							responses: {
								200: {
									description: "Success",
									content: {
										"application/json": {
											schema: {
												type: "object",
												properties: {
													token: {
														type: "string",
														description:
															"Session token for the authenticated session",
													},
													user: {
														$ref: "#/components/schemas/User",
													},
												},
												required: ["token", "user"],
											},
										},
									},
								},
							},
						},
					},
				},
				async (ctx) => {
					const { credential, password, rememberMe } = ctx.body;
					const logger = ctx.context.logger;

					// ================== Authenticate with LDAP credentials ===================
					const client = getDirectory(logger);
					let result: AuthenticationResult;
					try {
						await client.ensureConnected();
						result = await client.authenticate(credential, password);
					} catch (error) {
						logger.error("LDAP authentication failed", { error });
						throw new APIError("SERVICE_UNAVAILABLE", {
							message: LDAP_PLUGIN_ERROR_CODES.DIRECTORY_UNAVAILABLE,
						});
					}

					if (result.restoreError) {
						logger.warn("LDAP service bind could not be restored", { error: result.restoreError });
					}
					if (!result.authenticated) {
						logger.error("LDAP authentication failed", { code: result.error.code });
						if (result.error.kind === "connection") {
							throw new APIError("SERVICE_UNAVAILABLE", {
								message: LDAP_PLUGIN_ERROR_CODES.DIRECTORY_UNAVAILABLE,
							});
						}
						if (result.error.kind === "config") {
							throw new APIError("INTERNAL_SERVER_ERROR", {
								message: LDAP_PLUGIN_ERROR_CODES.UNEXPECTED_ERROR,
							});
						}
						// TODO: timing attack mitigation, unknown users answer faster than wrong passwords
						throw new APIError("UNAUTHORIZED", {
							message: LDAP_PLUGIN_ERROR_CODES.INVALID_USERNAME_OR_PASSWORD,
						});
					}

					// ================== Map the directory identity ===================
					let mapped: Partial<User> | null | undefined;
					try {
						mapped = await mapIdentity({
							username: credential,
							dn: result.dn,
							attributes: result.attributes,
						});
					} catch (error) {
						logger.error("Failed to map the LDAP identity", { error });
						throw new APIError("UNAUTHORIZED", {
							message: LDAP_PLUGIN_ERROR_CODES.INVALID_USERNAME_OR_PASSWORD,
						});
					}
					if (!mapped) {
						logger.error("LDAP identity rejected by onLdapAuthenticated", { dn: result.dn });
						throw new APIError("UNAUTHORIZED", {
							message: LDAP_PLUGIN_ERROR_CODES.INVALID_USERNAME_OR_PASSWORD,
						});
					}
					const { email: mappedEmail, id: _id, ...userData } = mapped;
					const email = mappedEmail?.toLowerCase();
					if (!email) {
						logger.error("LDAP entry has no email", { dn: result.dn, emailAttribute });
						throw new APIError("UNPROCESSABLE_ENTITY", {
							message: LDAP_PLUGIN_ERROR_CODES.EMAIL_REQUIRED,
						});
					}

					// ================== Find User & Account, also Auto-SignUp if enabled ===================
					let user = await ctx.context.adapter.findOne<User>({
						model: "user",
						where: [
							{
								field: "email",
								value: email,
							},
						],
					});

					if (!options.autoSignUp && !user) {
						logger.error("User not found", { email });
						throw new APIError("UNAUTHORIZED", {
							message: LDAP_PLUGIN_ERROR_CODES.INVALID_USERNAME_OR_PASSWORD,
						});
					}

					if (
						user && !user.emailVerified &&
						ctx.context.options.emailAndPassword?.requireEmailVerification
					) {
						await sendVerificationEmailFn(ctx, user);
						throw new APIError("FORBIDDEN", {
							message: LDAP_PLUGIN_ERROR_CODES.EMAIL_NOT_VERIFIED,
						});
					}

					if (!user) {
						// Sign up: create the user and link an account of this provider
						const { name, ...restUserData } = userData;
						user = await ctx.context.internalAdapter.createUser({
							...restUserData,
							email,
							name: name || credential,
							emailVerified: false,
						});
						if (!user) {
							throw new APIError("UNPROCESSABLE_ENTITY", {
								message: LDAP_PLUGIN_ERROR_CODES.UNEXPECTED_ERROR,
							});
						}

						await ctx.context.internalAdapter.linkAccount({
							userId: user.id,
							providerId,
							accountId: result.dn,
						});

						if (
							ctx.context.options.emailVerification?.sendOnSignUp ||
							ctx.context.options.emailAndPassword?.requireEmailVerification
						) {
							await sendVerificationEmailFn(ctx, user);

							// Mimics the email and password sign up: no session until the email is verified
							if (ctx.context.options.emailAndPassword?.requireEmailVerification) {
								return ctx.json({
									token: null,
									user: parseUserOutput(ctx.context.options, user),
								});
							}
						}
					} else {
						// Sign in: the user needs an account of this provider
						const account = await ctx.context.adapter.findOne<Account>({
							model: "account",
							where: [
								{
									field: "userId",
									value: user.id,
								},
								{
									field: "providerId",
									value: providerId,
								},
							],
						});

						if (!account && !(options.autoSignUp && options.linkAccountIfExisting)) {
							logger.error("User exists but has no account for this provider", { providerId });
							throw new APIError("UNAUTHORIZED", {
								message: LDAP_PLUGIN_ERROR_CODES.INVALID_USERNAME_OR_PASSWORD,
							});
						}
						if (account?.password) {
							logger.error("Shouldn't login with ldap, this account has a password", { providerId });
							throw new APIError("UNAUTHORIZED", {
								message: LDAP_PLUGIN_ERROR_CODES.INVALID_USERNAME_OR_PASSWORD,
							});
						}

						if (!account) {
							await ctx.context.internalAdapter.linkAccount({
								userId: user.id,
								providerId,
								accountId: result.dn,
							});
						}

						if (Object.keys(userData).length > 0) {
							const updated = await ctx.context.internalAdapter.updateUser(user.id, userData);
							if (updated) {
								user = updated;
							}
						}
					}

					// ================== Authenticated! Proceed with login flow ===================
					if (!user) {
						throw new APIError("UNPROCESSABLE_ENTITY", {
							message: LDAP_PLUGIN_ERROR_CODES.UNEXPECTED_ERROR,
						});
					}
					const session = await ctx.context.internalAdapter.createSession(
						user.id,
						rememberMe === false,
					);
					if (!session) {
						logger.error("Failed to create session");
						throw new APIError("BAD_REQUEST", {
							message: LDAP_PLUGIN_ERROR_CODES.UNEXPECTED_ERROR,
						});
					}
					await setSessionCookie(
						ctx,
						{ session, user },
						rememberMe === false,
					);
					return ctx.json({
						token: session.token,
						user: parseUserOutput(ctx.context.options, user),
					});
				},
			),
		},
		$ERROR_CODES: LDAP_PLUGIN_ERROR_CODES,
	} satisfies BetterAuthPlugin;
};
