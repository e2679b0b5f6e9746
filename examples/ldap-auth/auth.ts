import { betterAuth, BetterAuthOptions } from "better-auth";
import { fromNodeHeaders } from "better-auth/node";
import { openAPI } from "better-auth/plugins";
import { Request } from "express";
import { ldap, LDAPOptions } from "../../src/ldap/index.js";

/**
 * better-auth instance where users both sign in and sign up through the directory
 */
export function createAuth(
    database: BetterAuthOptions["database"],
    ldapOptions: LDAPOptions,
    options: Omit<BetterAuthOptions, "database" | "plugins"> = {},
) {
    const auth = betterAuth({
        ...options,
        database,
        emailAndPassword: {
            enabled: true,
        },
        plugins: [
            openAPI(),
            ldap({
                // Sucessful authenticated users will have a 'ldap' Account linked to them, no matter if they previously exists or not
                autoSignUp: true,
                linkAccountIfExisting: true,
                ...ldapOptions,
            }),
        ],
    });

    // https://github.com/Bekacru/t3-app-better-auth/blob/main/src/server/auth.ts
    const getSession = async (req: Request) => {
        return await auth.api.getSession({
            headers: fromNodeHeaders(req.headers)
        });
    };

    return { auth, getSession };
}
