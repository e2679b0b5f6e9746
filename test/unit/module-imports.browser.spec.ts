import { describe, expect, it } from "vitest";
import { ldapClient } from "../../client.js";

describe("Should be able to import on browser", () => {
    it("should import the module without errors", async () => {
        expect(typeof ldapClient).toBe("function");
        expect(ldapClient().id).toBe("ldap");
    });
});
