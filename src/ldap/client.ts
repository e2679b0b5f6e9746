import type { BetterAuthClientPlugin } from "better-auth";
import type { ldap } from "./index.js";

export const ldapClient = <P extends string = "/sign-in/ldap">() => {
	return {
		id: "ldap",
		$InferServerPlugin: {} as ReturnType<typeof ldap<P>>,
	} satisfies BetterAuthClientPlugin;
};
